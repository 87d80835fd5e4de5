export type PhotoRecord = {
  entryId: string;
  photoPath: string;
  aspectName: string;
  description: string;
  embedding: number[];
};

export type SearchResult = {
  photoPath: string;
  aspectName: string;
  distance: number;
  description: string;
};

export type ErrorKind = "image_read" | "provider" | "store" | "validation" | "internal";

export type Failure = { ok: false; kind: ErrorKind; message: string };

/** Explicit success/failure result returned by every public operation. */
export type Outcome<T> = { ok: true; value: T } | Failure;

export type IndexItemStatus = "indexed" | "skipped" | "failed";

export type IndexItemResult = {
  photoPath: string;
  status: IndexItemStatus;
  kind?: ErrorKind;
  message: string;
};

export type IndexingSummary = {
  directory: string;
  aspectName: string;
  total: number;
  indexed: number;
  skipped: number;
  failed: number;
  items: IndexItemResult[];
};

export type IndexingProgress = {
  completed: number;
  total: number;
  item: IndexItemResult;
};
