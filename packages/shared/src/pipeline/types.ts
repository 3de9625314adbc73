export type CorrelationId = string & { readonly __brand: "CorrelationId" };

export type AnswerStage = "match" | "compose" | "complete" | "extract_references";
