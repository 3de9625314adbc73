import { readFile } from "node:fs/promises";
import type { ServiceRecord } from "@civic-assist/shared";
import { parseServiceRecords } from "./catalog-schema.js";
import { DataLoadError } from "./errors.js";

export interface ServiceRecordLoader {
  loadRecords(source: string): Promise<ServiceRecord[]>;
}

function readErrorCode(error: unknown): string | undefined {
  if (!error || typeof error !== "object") {
    return undefined;
  }
  const code = (error as { code?: unknown }).code;
  return typeof code === "string" ? code : undefined;
}

export class JsonFileServiceLoader implements ServiceRecordLoader {
  async loadRecords(source: string): Promise<ServiceRecord[]> {
    let contents: string;
    try {
      contents = await readFile(source, "utf8");
    } catch (error) {
      const message = readErrorCode(error) === "ENOENT" ? "Catalog source not found" : "Catalog source unreadable";
      throw new DataLoadError({ source, message, cause: error });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(contents);
    } catch (error) {
      throw new DataLoadError({ source, message: "Catalog source is not valid JSON", cause: error });
    }

    return parseServiceRecords(raw, source);
  }
}

/**
 * Read-only, load-once collection of service records. Lookups never throw for
 * unknown ids and there is no write path after construction.
 */
export class ServiceCatalog {
  private readonly records: readonly ServiceRecord[];
  private readonly byId: ReadonlyMap<string, ServiceRecord>;

  private constructor(records: readonly ServiceRecord[], byId: ReadonlyMap<string, ServiceRecord>) {
    this.records = records;
    this.byId = byId;
  }

  static fromRecords(records: readonly ServiceRecord[], source = "memory"): ServiceCatalog {
    const byId = new Map<string, ServiceRecord>();
    records.forEach((record, index) => {
      if (byId.has(record.id)) {
        throw new DataLoadError({ source, path: `$[${index}]`, message: `Duplicate service id "${record.id}"` });
      }
      byId.set(record.id, record);
    });
    return new ServiceCatalog(Object.freeze([...records]), byId);
  }

  static async load(loader: ServiceRecordLoader, source: string): Promise<ServiceCatalog> {
    let records: ServiceRecord[];
    try {
      records = await loader.loadRecords(source);
    } catch (error) {
      if (error instanceof DataLoadError) {
        throw error;
      }
      throw new DataLoadError({ source, message: "Catalog loader failed", cause: error });
    }
    return ServiceCatalog.fromRecords(records, source);
  }

  get size(): number {
    return this.records.length;
  }

  get(id: string): ServiceRecord | undefined {
    return this.byId.get(id);
  }

  *all(): IterableIterator<ServiceRecord> {
    yield* this.records;
  }
}
