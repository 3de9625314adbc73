export interface ServiceRecord {
  readonly id: string;
  readonly title: string;
  readonly description: string;
  readonly requiredDocuments: readonly string[];
  readonly process: string;
  readonly applicationLink?: string;
  readonly physicalVerificationRequired: boolean;
  readonly department?: string;
  readonly outputFormat?: string;
}

export interface ServiceMatch {
  record: ServiceRecord;
  score: number;
}

export interface MatchResult {
  matches: ServiceMatch[];
}

export interface ResponseEnvelope {
  response: string;
  timestamp: string;
  serviceReferences: string[];
}
