import { LoadedDocument } from "./types.js";

export interface ClearSessionResult {
  cleared_documents: number;
  cleared_chunks: number;
}

/**
 * Per-session slots for the active document. A session holds at most one
 * document; `replace` swaps text, chunks and structure together.
 */
export interface SessionStateStore {
  current(): LoadedDocument | null;
  replace(document: LoadedDocument): void;
  clear(): ClearSessionResult;
}
