export type { MatchResult, ResponseEnvelope, ServiceMatch, ServiceRecord } from "./services/types.js";

export type { AnswerStage, CorrelationId } from "./pipeline/types.js";

export {
  MAX_CORRELATION_ID_CHARS,
  asCorrelationId,
  isCorrelationId,
  newCorrelationId,
  parseCorrelationId
} from "./pipeline/ids.js";
