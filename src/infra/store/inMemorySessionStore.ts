import { ClearSessionResult, SessionStateStore } from "../../domain/sessionState.js";
import { LoadedDocument } from "../../domain/types.js";

export class InMemorySessionStore implements SessionStateStore {
  private document: LoadedDocument | null = null;

  current(): LoadedDocument | null {
    return this.document;
  }

  replace(document: LoadedDocument): void {
    this.document = document;
  }

  clear(): ClearSessionResult {
    const cleared = this.document;
    this.document = null;
    return {
      cleared_documents: cleared ? 1 : 0,
      cleared_chunks: cleared?.chunks.length ?? 0,
    };
  }
}
