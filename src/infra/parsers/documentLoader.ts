import { promises as fs } from "node:fs";
import path from "node:path";
import { normalizeText } from "../../utils/text.js";

const SUPPORTED_EXTENSIONS = new Set([".md", ".txt", ".csv"]);

export interface LoadedText {
  source: string;
  content: string;
}

export function getSupportedDocumentExtensions(): string[] {
  return [...SUPPORTED_EXTENSIONS];
}

export async function loadDocumentText(filePath: string, maxBytes: number): Promise<LoadedText> {
  const source = path.resolve(filePath);
  const ext = path.extname(source).toLowerCase();
  if (!SUPPORTED_EXTENSIONS.has(ext)) {
    throw new Error(
      `Unsupported extension: ${ext || "(none)"}. Allowed: ${getSupportedDocumentExtensions().join(", ")}`,
    );
  }

  const stat = await fs.stat(source);
  if (stat.size > maxBytes) {
    throw new Error(`Document exceeds size limit (${stat.size} > ${maxBytes} bytes).`);
  }

  const content = normalizeText(await fs.readFile(source, "utf-8"));
  if (!content) {
    throw new Error("Empty content.");
  }

  return { source, content };
}
