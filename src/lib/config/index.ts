import { getConfigFromCli } from "./arg-parser.js";
import type { FuncletsConfig } from "./types.js";

export type { FuncletsConfig } from "./types.js";

let config: FuncletsConfig | undefined = undefined;
export const getConfig = () => {
  if (config) return config;
  config = getConfigFromCli();
  return config;
};
