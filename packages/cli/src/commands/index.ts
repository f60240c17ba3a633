export { runValues } from "./values.js";
export type { ValuesOptions } from "./values.js";
export { runStrings } from "./strings.js";
export type { StringsOptions } from "./strings.js";
export { runExplain } from "./explain.js";
export type { ExplainOptions } from "./explain.js";
export { loadConfig, defineConfig, configSchema, ConfigError } from "../config.js";
export type { AssertDiffConfig, AssertDiffConfigInput, LoadedConfig } from "../config.js";
export {
  parseCaseFile,
  renderCase,
  reviveValue,
  parseLiteral,
  toTolerance,
  caseFileSchema,
  CaseFileError,
} from "../cases.js";
export type { FailureCase, ToleranceInput } from "../cases.js";
