import { stdout } from "node:process";
import { getConfig } from "../lib/config/index.js";
import { printSsa } from "../ssa/printer.js";
import { serializeValidatedBody, toJson } from "../serialize.js";
import { validateFunctionBody } from "../validation/function-body.js";
import { formatCliDiagnostic } from "./diagnostics.js";
import { readBody } from "./input.js";
import { summarizeBody } from "./summary.js";

export const exec = () => main().catch(errorHandler);

async function main() {
  const config = getConfig();
  const progress = (message: string) => {
    if (config.verbose) console.error(`funclets: ${message}`);
  };

  const bytes = await readBody(config);
  progress(`read ${bytes.length} byte(s) from ${config.input}`);

  const result = validateFunctionBody(bytes, {
    signature: { params: config.params, results: config.results },
    hasMemory: config.memory,
    name: config.input,
  });

  if (!result.ok) {
    console.error(
      formatCliDiagnostic(result.diagnostic, { bytes, color: config.color })
    );
    process.exitCode = 1;
    return;
  }

  const { body } = result;
  progress(
    `validated ${body.instructionCount} instruction(s) in ${body.regions.length} region(s)`
  );

  if (config.emitMsgpack) {
    stdout.write(serializeValidatedBody(body));
    return;
  }

  if (config.emitJson) {
    return console.log(toJson(result));
  }

  if (config.emitSsa) {
    return console.log(printSsa(body.ssa));
  }

  console.log(summarizeBody(body));
}

function errorHandler(error: unknown) {
  console.error(error);
  process.exit(1);
}
