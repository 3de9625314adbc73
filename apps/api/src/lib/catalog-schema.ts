import type { ServiceRecord } from "@civic-assist/shared";
import { DataLoadError } from "./errors.js";

const NO_DOCUMENTS_PATTERN = /^no documents/i;
const VERIFICATION_TRUE = new Set(["yes", "y", "true", "required"]);
const VERIFICATION_FALSE = new Set(["no", "n", "false", "not required", "-", ""]);

type ParseContext = {
  source: string;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function fail(context: ParseContext, path: string, message: string): never {
  throw new DataLoadError({ source: context.source, path, message });
}

function readRequiredString(context: ParseContext, value: unknown, path: string): string {
  if (typeof value !== "string" || value.trim().length === 0) {
    fail(context, path, "Expected a non-empty string");
  }
  return value.trim();
}

function readText(context: ParseContext, value: unknown, path: string): string {
  if (value == null) {
    return "";
  }
  if (typeof value !== "string") {
    fail(context, path, "Expected a string");
  }
  return value.trim();
}

// "-" and blank cells mean the column was left empty in the export.
function readOptionalCell(context: ParseContext, value: unknown, path: string): string | undefined {
  const text = readText(context, value, path);
  return text.length > 0 && text !== "-" ? text : undefined;
}

function readDocuments(context: ParseContext, value: unknown, path: string): string[] {
  if (value == null) {
    return [];
  }

  if (typeof value === "string") {
    const text = value.trim();
    return text.length === 0 || NO_DOCUMENTS_PATTERN.test(text) ? [] : [text];
  }

  if (!Array.isArray(value)) {
    fail(context, path, "Expected a list of documents or a string");
  }

  const documents = value.map((entry, index) => readRequiredString(context, entry, `${path}[${index}]`));
  if (documents.length === 1 && NO_DOCUMENTS_PATTERN.test(documents[0] ?? "")) {
    return [];
  }
  return documents;
}

function readApprovalProcess(context: ParseContext, value: unknown, path: string): string {
  if (!isRecord(value)) {
    return readText(context, value, path);
  }

  const lines: string[] = [];
  for (const [level, approver] of Object.entries(value)) {
    const text = readOptionalCell(context, approver, `${path}.${level}`);
    if (text) {
      lines.push(`${level}: ${text}`);
    }
  }
  return lines.join("\n");
}

function readVerificationFlag(context: ParseContext, value: unknown, path: string): boolean {
  if (value == null) {
    return false;
  }
  if (typeof value === "boolean") {
    return value;
  }
  if (typeof value !== "string") {
    fail(context, path, "Expected a boolean or yes/no string");
  }

  const normalized = value.trim().toLowerCase();
  if (VERIFICATION_TRUE.has(normalized)) {
    return true;
  }
  if (VERIFICATION_FALSE.has(normalized)) {
    return false;
  }
  return fail(context, path, `Unrecognized physical verification value "${value}"`);
}

function freezeRecord(record: ServiceRecord): ServiceRecord {
  Object.freeze(record.requiredDocuments);
  return Object.freeze(record);
}

function parseFlatRecord(context: ParseContext, value: Record<string, unknown>, path: string): ServiceRecord {
  const applicationLink = readOptionalCell(context, value.applicationLink, `${path}.applicationLink`);
  const department = readOptionalCell(context, value.department, `${path}.department`);
  const outputFormat = readOptionalCell(context, value.outputFormat, `${path}.outputFormat`);

  return freezeRecord({
    id: readRequiredString(context, value.id, `${path}.id`),
    title: readRequiredString(context, value.title, `${path}.title`),
    description: readText(context, value.description, `${path}.description`),
    requiredDocuments: readDocuments(context, value.requiredDocuments, `${path}.requiredDocuments`),
    process: readApprovalProcess(context, value.process, `${path}.process`),
    physicalVerificationRequired: readVerificationFlag(
      context,
      value.physicalVerificationRequired,
      `${path}.physicalVerificationRequired`
    ),
    ...(applicationLink ? { applicationLink } : {}),
    ...(department ? { department } : {}),
    ...(outputFormat ? { outputFormat } : {})
  });
}

function parseExportedService(
  context: ParseContext,
  value: unknown,
  path: string,
  department: string
): ServiceRecord {
  if (!isRecord(value)) {
    fail(context, path, "Expected a service object");
  }

  const applicationLink = readOptionalCell(context, value["application link / url"], `${path}["application link / url"]`);
  const outputFormat = readOptionalCell(
    context,
    value["Output Certificate Format"],
    `${path}["Output Certificate Format"]`
  );

  return freezeRecord({
    id: readRequiredString(context, value.service_id, `${path}.service_id`),
    title: readRequiredString(context, value.Service, `${path}.Service`),
    description: readText(context, value.description, `${path}.description`),
    requiredDocuments: readDocuments(context, value["Documents Required"], `${path}["Documents Required"]`),
    process: readApprovalProcess(
      context,
      value["Levels of Approval / process"],
      `${path}["Levels of Approval / process"]`
    ),
    physicalVerificationRequired: readVerificationFlag(
      context,
      value["Physical Verification"],
      `${path}["Physical Verification"]`
    ),
    department,
    ...(applicationLink ? { applicationLink } : {}),
    ...(outputFormat ? { outputFormat } : {})
  });
}

/**
 * Validates raw catalog JSON into frozen service records.
 *
 * Accepts flat records keyed by the ServiceRecord field names, or the
 * department-grouped export (`[{ Department, Service: [...] }]`). Both shapes
 * may be mixed in one array.
 */
export function parseServiceRecords(raw: unknown, source: string): ServiceRecord[] {
  const context: ParseContext = { source };
  if (!Array.isArray(raw)) {
    fail(context, "$", "Expected a top-level array");
  }

  const records: ServiceRecord[] = [];
  raw.forEach((entry, index) => {
    const path = `$[${index}]`;
    if (!isRecord(entry)) {
      fail(context, path, "Expected an object");
    }

    if ("Department" in entry || "Service" in entry) {
      const department = readRequiredString(context, entry.Department, `${path}.Department`);
      if (!Array.isArray(entry.Service)) {
        fail(context, `${path}.Service`, "Expected a list of services");
      }
      entry.Service.forEach((service, serviceIndex) => {
        records.push(parseExportedService(context, service, `${path}.Service[${serviceIndex}]`, department));
      });
      return;
    }

    records.push(parseFlatRecord(context, entry, path));
  });

  return records;
}
