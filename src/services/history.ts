import {
  GENERATION_DEFAULTS,
  type DocumentData,
  type GenerationRequest,
  type HistoryRecord,
} from "../types.js";
import { attempt, type Result } from "../utils/result.js";

/**
 * Document storage used for generation history. Results of
 * getDocuments are newest first; an empty filter matches everything.
 */
export interface HistoryStore {
  createDocument(collection: string, record: DocumentData): Promise<void>;
  getDocuments(
    collection: string,
    filter: DocumentData,
    limit: number
  ): Promise<DocumentData[]>;
  /** Resolves when the backing database is reachable. */
  ping(): Promise<void>;
}

export class DatabaseUnavailableError extends Error {
  constructor() {
    super("Database not configured");
    this.name = "DatabaseUnavailableError";
  }
}

/** Store used when no database credentials are configured. */
export class UnavailableHistoryStore implements HistoryStore {
  async createDocument(): Promise<void> {
    throw new DatabaseUnavailableError();
  }

  async getDocuments(): Promise<DocumentData[]> {
    throw new DatabaseUnavailableError();
  }

  async ping(): Promise<void> {
    throw new DatabaseUnavailableError();
  }
}

export function toHistoryRecord(request: GenerationRequest): HistoryRecord {
  return {
    content: request.content,
    fill_color: request.fill_color,
    back_color: request.back_color,
    box_size: request.box_size,
    border: request.border,
    error_correction: request.error_correction,
    logo_url: request.logo_url ?? null,
  };
}

const text = (value: unknown, fallback: string): string =>
  typeof value === "string" ? value : fallback;

function integer(value: unknown, fallback: number): number {
  const parsed =
    typeof value === "number"
      ? value
      : typeof value === "string" && value.trim() !== ""
        ? Number(value)
        : Number.NaN;
  return Number.isFinite(parsed) ? Math.trunc(parsed) : fallback;
}

/** Fill in defaults for any field a stored document lacks. */
export function normalizeHistoryRecord(doc: DocumentData): HistoryRecord {
  return {
    content: text(doc.content, ""),
    fill_color: text(doc.fill_color, GENERATION_DEFAULTS.fill_color),
    back_color: text(doc.back_color, GENERATION_DEFAULTS.back_color),
    box_size: integer(doc.box_size, GENERATION_DEFAULTS.box_size),
    border: integer(doc.border, GENERATION_DEFAULTS.border),
    error_correction: text(
      doc.error_correction,
      GENERATION_DEFAULTS.error_correction
    ),
    logo_url: typeof doc.logo_url === "string" ? doc.logo_url : null,
  };
}

export async function saveHistory(
  store: HistoryStore,
  collection: string,
  request: GenerationRequest
): Promise<Result<void>> {
  return attempt(() =>
    store.createDocument(collection, { ...toHistoryRecord(request) })
  );
}

export async function loadHistory(
  store: HistoryStore,
  collection: string,
  limit: number
): Promise<Result<HistoryRecord[]>> {
  return attempt(async () => {
    const docs = await store.getDocuments(collection, {}, limit);
    return docs.map(normalizeHistoryRecord);
  });
}
