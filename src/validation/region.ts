import { Opcode } from "../binary/opcodes.js";
import {
  formatTypes,
  operandMatches,
  sameTypes,
  type OperandType,
  type ValueType,
} from "../binary/value-types.js";
import { assertInvariant } from "../diagnostics/index.js";
import { logRegion } from "../lib/debug.js";
import type { BlockId } from "../ssa/ir.js";
import {
  FuncletCallGraph,
  REGION_ENTRY,
  type EdgeKind,
} from "./call-graph.js";
import type { ControlFrame } from "./control-frames.js";
import type { RegionSummary, SignatureSource } from "./context.js";
import type { StackEntry } from "./operand-stack.js";
import type { BodyValidator } from "./validator.js";

export interface FuncletRecord {
  index: number;
  block: BlockId;
  /** Offset of the funclet's first byte, once entered. */
  offset: number;
  params?: readonly ValueType[];
  source?: SignatureSource;
  explicit: boolean;
  declaredBackwardPreds: number;
  /** Argument types of the first exact forward edge, before entry. */
  provisional?: readonly ValueType[];
  /** Offset just past the entry `funclet_sig`. */
  signatureEnd?: number;
}

export interface RegionState {
  id: number;
  offset: number;
  count: number;
  params: readonly ValueType[];
  results: readonly ValueType[];
  /** Index of the current funclet. */
  current: number;
  graph: FuncletCallGraph;
  funclets: Map<number, FuncletRecord>;
  exitBlock: BlockId;
  summary: RegionSummary;
}

type FuncletCallKind = "funclet_call" | "funclet_call_if" | "funclet_call_table";

type Transfer = {
  targets: number[];
  entries: StackEntry[];
  polymorphic: boolean;
};

/** Handles `funclet_region`: reads its header, pushes the region frame and enters funclet 0. */
export const openRegion = (v: BodyValidator): void => {
  const offset = v.instructionStart;
  const params = v.reader.valueTypes("region parameter types");
  const results = v.reader.valueTypes("region result types");
  const count = v.reader.varuint32("funclet count");
  if (count === 0) v.fail("DC0005", { kind: "zero-funclets" });

  const args = v.popTypes("funclet_region", params);
  const mark = v.stack.mark();
  const id = v.regions.length;
  const exitBlock = v.ssa.createBlock("region-exit", `region ${id} exit`);
  const summary: RegionSummary = {
    id,
    offset,
    depth: v.frames.depth,
    params,
    results,
    funclets: [],
    edges: [],
    exitBlock,
  };
  v.regions.push(summary);

  const region: RegionState = {
    id,
    offset,
    count,
    params,
    results,
    current: REGION_ENTRY,
    graph: new FuncletCallGraph(count),
    funclets: new Map(),
    exitBlock,
    summary,
  };

  v.frames.push({
    kind: "region",
    params,
    results,
    height: mark,
    unreachable: false,
    labelBlock: exitBlock,
    endBlock: exitBlock,
    entryValues: [],
    offset,
    region,
  });

  logRegion(
    `region ${id} at ${offset}: ${count} funclet(s) ${formatTypes(params)} -> ${formatTypes(results)}`
  );

  region.graph.recordEdge({
    from: REGION_ENTRY,
    to: 0,
    args: params,
    polymorphic: false,
    offset,
    kind: "region-entry",
  });
  v.jump(funcletRecord(v, region, 0).block, args, "region-entry");
  enterFunclet(v, region, 0);
};

/**
 * Fixes the signature of funclet `index`, checks every edge recorded into it
 * so far and starts validating its body.
 */
export const enterFunclet = (
  v: BodyValidator,
  region: RegionState,
  index: number
): void => {
  const offset = v.reader.offset;
  if (v.reader.eof()) {
    v.fail(
      "ST0003",
      { kind: "region-incomplete", produced: index, declared: region.count },
      { start: offset }
    );
  }

  const record = funcletRecord(v, region, index);
  record.offset = offset;

  if (v.reader.peekU8() === Opcode.FuncletSig) {
    v.instructionStart = offset;
    v.instructionCount += 1;
    v.reader.u8("opcode");
    record.params = v.reader.valueTypes("funclet parameter types");
    record.declaredBackwardPreds = v.reader.varuint32("num_preds");
    record.explicit = true;
    record.source = "explicit";
    record.signatureEnd = v.reader.offset;
  } else if (index === 0) {
    record.params = [];
    record.source = "default";
  } else if (record.provisional) {
    record.params = record.provisional;
    record.source = "inferred";
  } else {
    v.fail(
      "SG0001",
      { kind: "unresolved-signature", funclet: index },
      { start: offset, details: { funclet: index } }
    );
  }

  const params = record.params ?? [];
  if (index === 0 && !sameTypes(region.params, params)) {
    v.fail(
      "TY0005",
      {
        kind: "region-entry",
        regionParams: formatTypes(region.params),
        funcletParams: formatTypes(params),
      },
      {
        start: offset,
        details: { funclet: 0, expected: params, actual: region.params },
      }
    );
  }

  region.graph.edgesTo(index).forEach((edge) => {
    if (edge.kind === "region-entry") return;
    checkArguments(v, {
      from: edge.from,
      to: index,
      args: edge.args,
      polymorphic: edge.polymorphic,
      offset: edge.offset,
      expected: params,
    });
  });

  const sealReady = region.graph.enter(index, record.declaredBackwardPreds);
  if (sealReady) v.ssa.sealBlock(record.block);

  region.current = index;
  const frame = regionFrame(v, region);
  v.stack.truncate(frame.height);
  frame.unreachable = false;
  v.current = record.block;
  v.pushEntries(v.blockArguments(record.block, params));

  logRegion(
    `region ${region.id} funclet ${index} ${record.source ?? "?"} ${formatTypes(params)}` +
      (record.explicit ? ` preds=${record.declaredBackwardPreds}` : "")
  );
};

/** Moves past the funclet that just transferred control away at region level. */
export const closeFunclet = (v: BodyValidator, region: RegionState): void => {
  if (region.current === region.count - 1) {
    finalizeRegion(v, region);
    return;
  }
  enterFunclet(v, region, region.current + 1);
};

/**
 * `end` at region level: an implicit call of the next funclet, or the region
 * exit for the last one.
 */
export const endFunclet = (v: BodyValidator, region: RegionState): void => {
  const frame = regionFrame(v, region);
  if (region.current < region.count - 1) {
    const transfer: Transfer = {
      targets: [region.current + 1],
      ...transferArguments(v, frame, 0),
    };
    const sealed = recordTransfer(v, region, transfer, "end");
    v.jump(blockOf(v, region, region.current + 1), transfer.entries, "end");
    sealed.forEach((block) => v.ssa.sealBlock(block));
  } else {
    const values = v.frameExitValues(frame, region.results, "region-exit");
    v.jump(region.exitBlock, values, "end");
  }
  v.markUnreachable();
  closeFunclet(v, region);
};

/** Handles `funclet_call`, `funclet_call_if` and `funclet_call_table`. */
export const recordFuncletCall = (v: BodyValidator, kind: FuncletCallKind): void => {
  const deltas =
    kind === "funclet_call_table"
      ? readTableDeltas(v)
      : [v.reader.varint32("funclet call delta")];

  const depth = v.frames.innermostRegionDepth();
  const frame = v.frames.label(depth);
  const region = frame?.region;
  if (depth < 0 || !frame || !region) {
    return v.fail("ST0004", { kind: "outside-region", instruction: kind });
  }

  const targets = deltas.map((delta) => {
    const target = region.current + delta;
    if (target < 0 || target >= region.count) {
      return v.fail(
        "ST0002",
        {
          kind: "target-out-of-range",
          funclet: region.current,
          delta,
          target,
          count: region.count,
        },
        { details: { funclet: region.current } }
      );
    }
    return target;
  });

  const selector =
    kind === "funclet_call" ? undefined : v.pop(kind, "i32").value;
  const transfer: Transfer = { targets, ...transferArguments(v, frame, depth) };
  const sealed = recordTransfer(v, region, transfer, kind);
  const [first = 0] = targets;
  const defaultTarget = targets[targets.length - 1] ?? first;

  if (kind === "funclet_call_if" && selector !== undefined) {
    const target = blockOf(v, region, first);
    const source = v.current;
    const next = v.successor("continue");
    v.transfer(target, transfer.entries);
    v.ssa.terminate(source, {
      kind: "branch",
      condition: selector,
      then: target,
      else: next,
      via: kind,
    });
    v.current = next;
    sealed.forEach((block) => v.ssa.sealBlock(block));
    return;
  }

  distinct(targets).forEach((target) =>
    v.transfer(blockOf(v, region, target), transfer.entries)
  );
  if (selector === undefined) {
    v.ssa.terminate(v.current, {
      kind: "jump",
      target: blockOf(v, region, first),
      via: kind,
    });
  } else {
    v.ssa.terminate(v.current, {
      kind: "table",
      index: selector,
      targets: targets.slice(0, -1).map((target) => blockOf(v, region, target)),
      default: blockOf(v, region, defaultTarget),
      via: kind,
    });
  }
  sealed.forEach((block) => v.ssa.sealBlock(block));

  v.markUnreachable();
  if (depth === 0) closeFunclet(v, region);
};

/** `funclet_sig` anywhere but as the first instruction of a funclet. */
export const rejectFuncletSig = (v: BodyValidator): never => {
  v.reader.valueTypes("funclet parameter types");
  v.reader.varuint32("num_preds");

  const region = v.frames.label(v.frames.innermostRegionDepth())?.region;
  if (!region) return v.fail("ST0001", { kind: "outside-region" });

  const funclet = region.current;
  const record = region.funclets.get(funclet);
  const duplicate = record?.signatureEnd === v.instructionStart;
  return v.fail(
    "ST0001",
    duplicate ? { kind: "duplicate", funclet } : { kind: "not-first", funclet },
    { details: { funclet } }
  );
};

/**
 * Last funclet done: checks predecessor counts, pops the region frame and
 * continues in the region's exit block with its results.
 */
export const finalizeRegion = (v: BodyValidator, region: RegionState): void => {
  const { graph } = region;
  region.funclets.forEach((record) => {
    if (!record.explicit) return;
    const observed = graph.backwardCount(record.index);
    if (observed !== record.declaredBackwardPreds) {
      v.fail(
        "PD0003",
        {
          kind: "missing-backward-calls",
          funclet: record.index,
          declared: record.declaredBackwardPreds,
          observed,
        },
        { start: record.offset, details: { funclet: record.index } }
      );
    }
  });

  assertInvariant(
    graph.lastEntered === region.count - 1,
    `region ${region.id} finalized after ${graph.lastEntered + 1} funclet(s)`
  );
  region.funclets.forEach((record) =>
    assertInvariant(
      graph.isSealed(record.index),
      `funclet ${record.index} of region ${region.id} was never sealed`
    )
  );

  v.ssa.sealBlock(region.exitBlock);
  const frame = v.frames.pop();
  assertInvariant(frame.region === region, "region frame is not on top");
  v.stack.truncate(frame.height);
  v.current = region.exitBlock;
  v.pushEntries(v.blockArguments(region.exitBlock, region.results));

  region.summary.edges = [...graph.edges];
  region.summary.funclets = [...region.funclets.values()]
    .sort((left, right) => left.index - right.index)
    .map((record) => ({
      index: record.index,
      offset: record.offset,
      params: record.params ?? [],
      signatureSource: record.source ?? "default",
      declaredBackwardPreds: record.declaredBackwardPreds,
      forwardPreds: graph.forwardCount(record.index),
      backwardPreds: graph.backwardCount(record.index),
      entryBlock: record.block,
    }));

  logRegion(`region ${region.id} finalized with ${graph.edges.length} edge(s)`);
};

/**
 * Checks and records one edge per distinct target. Returns the entry blocks
 * that became seal-ready; they are sealed once the SSA edges exist.
 */
const recordTransfer = (
  v: BodyValidator,
  region: RegionState,
  { targets, entries, polymorphic }: Transfer,
  kind: EdgeKind
): BlockId[] => {
  const from = region.current;
  const args = entries.map((entry) => entry.type);
  const offset = v.instructionStart;

  return distinct(targets).flatMap((target) => {
    const record = funcletRecord(v, region, target);
    if (target <= from) {
      if (!record.explicit) {
        v.fail(
          "PD0001",
          { kind: "undeclared-backward-call", funclet: target, from },
          { details: { funclet: target } }
        );
      }
      if (
        region.graph.backwardCount(target) >= record.declaredBackwardPreds
      ) {
        v.fail(
          "PD0002",
          {
            kind: "excess-backward-calls",
            funclet: target,
            declared: record.declaredBackwardPreds,
          },
          { details: { funclet: target } }
        );
      }
      checkArguments(v, {
        from,
        to: target,
        args,
        polymorphic,
        offset,
        expected: record.params ?? [],
      });
    } else if (record.provisional) {
      checkArguments(v, {
        from,
        to: target,
        args,
        polymorphic,
        offset,
        expected: record.provisional,
      });
    } else if (!polymorphic) {
      record.provisional = knownTypes(args);
    }

    const { sealReady } = region.graph.recordEdge({
      from,
      to: target,
      args,
      polymorphic,
      offset,
      kind,
    });
    return sealReady ? [record.block] : [];
  });
};

const checkArguments = (
  v: BodyValidator,
  {
    from,
    to,
    args,
    polymorphic,
    offset,
    expected,
  }: {
    from: number;
    to: number;
    args: readonly OperandType[];
    polymorphic: boolean;
    offset: number;
    expected: readonly ValueType[];
  }
): void => {
  const missing = expected.length - args.length;
  const matches = polymorphic
    ? missing >= 0 &&
      args.every((type, index) =>
        operandMatches(type, expected[index + missing] ?? "unknown")
      )
    : sameTypes(args, expected);
  if (matches) return;

  v.fail(
    "TY0003",
    {
      kind: "funclet-arguments",
      from,
      to,
      expected: formatTypes(expected),
      actual: formatTypes(args),
    },
    { start: offset, details: { funclet: to, expected, actual: args } }
  );
};

/**
 * The values a funclet transfer carries: everything above the region mark,
 * or only the known suffix when some frame inside the region is unreachable.
 */
const transferArguments = (
  v: BodyValidator,
  frame: ControlFrame,
  depth: number
): { entries: StackEntry[]; polymorphic: boolean } => {
  const dead = v.frames.framesAbove(depth).find((inner) => inner.unreachable);
  if (dead) {
    return { entries: v.stack.valuesAbove(dead.height), polymorphic: true };
  }
  const entries = v.stack.valuesAbove(frame.height);
  return {
    entries,
    polymorphic: entries.some((entry) => entry.type === "unknown"),
  };
};

const readTableDeltas = (v: BodyValidator): number[] => {
  const count = v.reader.varuint32("funclet table size");
  const deltas: number[] = [];
  for (let index = 0; index < count; index += 1) {
    deltas.push(v.reader.varint32("funclet table delta"));
  }
  deltas.push(v.reader.varint32("funclet table default"));
  return deltas;
};

const funcletRecord = (
  v: BodyValidator,
  region: RegionState,
  index: number
): FuncletRecord => {
  const existing = region.funclets.get(index);
  if (existing) return existing;
  const record: FuncletRecord = {
    index,
    block: v.ssa.createBlock("funclet", `region ${region.id} funclet ${index}`),
    offset: -1,
    explicit: false,
    declaredBackwardPreds: 0,
  };
  region.funclets.set(index, record);
  return record;
};

const blockOf = (v: BodyValidator, region: RegionState, index: number): BlockId =>
  funcletRecord(v, region, index).block;

const regionFrame = (v: BodyValidator, region: RegionState): ControlFrame => {
  const frame = v.frames.top();
  assertInvariant(frame.region === region, `region ${region.id} is not the innermost frame`);
  return frame;
};

const knownTypes = (types: readonly OperandType[]): ValueType[] =>
  types.flatMap((type) => (type === "unknown" ? [] : [type]));

const distinct = (targets: readonly number[]): number[] => [...new Set(targets)];

