export type { ScenarioMetadata, ScenarioModel, ParsedScenario } from "./codec.js";
export type { RawLineSections, RebalanceResult } from "./rebalance.js";
export type { DepotRewrite } from "./depot-lines.js";
export type { EdgeLine, ExtractedWeight, WeightFallback } from "./annotation.js";
export type { ScenarioWarning, WeightFallbackWarning, MissingFileWarning } from "./errors.js";

export { parseScenario, serializeScenario } from "./codec.js";
export { rebalanceRequiredEdges, splitSections } from "./rebalance.js";
export { rewriteDepotLines } from "./depot-lines.js";
export {
  DEFAULT_EDGE_WEIGHT,
  extractWeight,
  formatEdgeLine,
  isEdgeLine,
  parseEdgeLine
} from "./annotation.js";
export { FormatError, describeWarning, isFormatError } from "./errors.js";
export { joinLines, splitLines } from "./format.js";
