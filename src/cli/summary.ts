import { formatTypes } from "../binary/value-types.js";
import type { FuncletSummary, RegionSummary, ValidatedBody } from "../validation/context.js";

const funcletLine = (funclet: FuncletSummary): string =>
  `  funclet ${funclet.index} @${funclet.offset} ${formatTypes(funclet.params)} (${
    funclet.signatureSource
  }) preds: ${funclet.forwardPreds} forward, ${funclet.backwardPreds}/${
    funclet.declaredBackwardPreds
  } backward`;

const regionLines = (region: RegionSummary): string[] => [
  `region ${region.id} @${region.offset} depth ${region.depth}: ${formatTypes(
    region.params
  )} -> ${formatTypes(region.results)}, ${region.funclets.length} funclet(s), ${
    region.edges.length
  } edge(s)`,
  ...region.funclets.map(funcletLine),
];

/** Plain-text overview printed when no emit option is given. */
export const summarizeBody = (body: ValidatedBody): string =>
  [
    `${body.name}: ${body.byteLength} byte(s), ${body.instructionCount} instruction(s)`,
    `signature ${formatTypes(body.params)} -> ${formatTypes(body.results)}`,
    `locals ${formatTypes(body.locals)}`,
    ...body.regions.flatMap(regionLines),
    `ssa: ${body.ssa.blocks.length} block(s), ${body.ssa.values.length} value(s)`,
  ].join("\n");
