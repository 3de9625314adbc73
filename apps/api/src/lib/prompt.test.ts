import assert from "node:assert/strict";
import test from "node:test";
import type { MatchResult, ServiceRecord } from "@civic-assist/shared";
import { composePrompt, renderServiceRecord } from "./prompt.js";

const birth: ServiceRecord = {
  id: "service-41",
  title: "Birth Certificate",
  description: "Certified copy of a registered birth.",
  requiredDocuments: ["Hospital birth report", "Address proof"],
  process: "Level 1: Registrar of Births",
  physicalVerificationRequired: false,
  department: "Health Department",
  outputFormat: "Digitally signed PDF",
  applicationLink: "https://services.example.gov/apply/birth-certificate"
};

const receipt: ServiceRecord = {
  id: "service-64",
  title: "Duplicate Tax Receipt",
  description: "Duplicate receipt for tax already paid.",
  requiredDocuments: [],
  process: "Level 1: Ward Tax Clerk",
  physicalVerificationRequired: true
};

const shortlist: MatchResult = {
  matches: [
    { record: birth, score: 7 },
    { record: receipt, score: 1 }
  ]
};

test("renderServiceRecord lists every field of a record", () => {
  assert.equal(
    renderServiceRecord(birth),
    [
      "SERVICE ID: service-41",
      "Title: Birth Certificate",
      "Department: Health Department",
      "Description: Certified copy of a registered birth.",
      "Required Documents:",
      "- Hospital birth report",
      "- Address proof",
      "Process: Level 1: Registrar of Births",
      "Physical Verification: Not required",
      "Output Certificate Format: Digitally signed PDF",
      "Application Link: https://services.example.gov/apply/birth-certificate"
    ].join("\n")
  );

  assert.equal(
    renderServiceRecord(receipt),
    [
      "SERVICE ID: service-64",
      "Title: Duplicate Tax Receipt",
      "Description: Duplicate receipt for tax already paid.",
      "Required Documents: No documents required",
      "Process: Level 1: Ward Tax Clerk",
      "Physical Verification: Required",
      "Application Link: Not available"
    ].join("\n")
  );
});

test("composePrompt grounds the question on the shortlisted services only", () => {
  const prompt = composePrompt("What documents do I need for a birth certificate?", shortlist);

  assert.ok(prompt.includes("Answer using only the service information listed under MATCHED SERVICES."));
  assert.ok(prompt.includes(renderServiceRecord(birth)));
  assert.ok(prompt.includes(renderServiceRecord(receipt)));
  assert.deepEqual(prompt.match(/service-\d+/g), ["service-41", "service-64"]);
  assert.ok(prompt.endsWith("USER QUESTION: What documents do I need for a birth certificate?"));
});

test("composePrompt tells the model not to invent a service when nothing matched", () => {
  const prompt = composePrompt("xyz completely unrelated gibberish", { matches: [] });

  assert.ok(prompt.includes("Tell the user that no matching service was found"));
  assert.equal(prompt.includes("MATCHED SERVICES"), false);
  assert.equal(prompt.match(/service-\d+/g), null);
  assert.ok(prompt.endsWith("USER QUESTION: xyz completely unrelated gibberish"));
});

test("composePrompt is deterministic", () => {
  assert.equal(composePrompt("birth certificate", shortlist), composePrompt("birth certificate", shortlist));
});
