import type { MatchResult, ServiceRecord } from "@civic-assist/shared";

const GROUNDED_PREAMBLE = [
  "You are a friendly, helpful assistant for municipal corporation services.",
  "Answer using only the service information listed under MATCHED SERVICES.",
  "If that information does not answer the question, say you do not have enough information and ask a clarifying follow-up. Do not guess.",
  "Reference the id of every service you use exactly as it is written in its SERVICE ID line.",
  "When giving a link, write it as LINK:<url>.",
  "Put each list item (documents, steps, requirements) on its own line starting with \"- \".",
  "Keep the answer under 200 words unless the user asks for detail."
].join("\n");

const NO_MATCH_PREAMBLE = [
  "You are a friendly, helpful assistant for municipal corporation services.",
  "No service in the catalog matched the user's question.",
  "Tell the user that no matching service was found and suggest rephrasing the question with the name of the certificate, license or permit they need.",
  "Do not invent a service, required documents, links or service ids."
].join("\n");

function renderDocuments(documents: readonly string[]): string {
  if (documents.length === 0) {
    return "Required Documents: No documents required";
  }
  return ["Required Documents:", ...documents.map((document) => `- ${document}`)].join("\n");
}

export function renderServiceRecord(record: ServiceRecord): string {
  const lines = [`SERVICE ID: ${record.id}`, `Title: ${record.title}`];
  if (record.department) {
    lines.push(`Department: ${record.department}`);
  }
  lines.push(
    `Description: ${record.description || "Not specified"}`,
    renderDocuments(record.requiredDocuments),
    `Process: ${record.process || "Not specified"}`,
    `Physical Verification: ${record.physicalVerificationRequired ? "Required" : "Not required"}`
  );
  if (record.outputFormat) {
    lines.push(`Output Certificate Format: ${record.outputFormat}`);
  }
  lines.push(`Application Link: ${record.applicationLink ?? "Not available"}`);
  return lines.join("\n");
}

export function composePrompt(question: string, matchResult: MatchResult): string {
  if (matchResult.matches.length === 0) {
    return [NO_MATCH_PREAMBLE, `USER QUESTION: ${question}`].join("\n\n");
  }

  const services = matchResult.matches.map((match) => renderServiceRecord(match.record)).join("\n\n");
  return [GROUNDED_PREAMBLE, `MATCHED SERVICES:\n\n${services}`, `USER QUESTION: ${question}`].join("\n\n");
}
