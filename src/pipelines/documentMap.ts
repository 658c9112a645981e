import { StructuralIndex } from "../domain/types.js";
import { formatCount } from "../utils/text.js";

export const MAP_CHAPTER_LIMIT = 20;
export const MAP_TITLE_LIMIT = 100;
export const MAP_TOC_PREVIEW_LIMIT = 1000;

export function buildDocumentMap(text: string, structure: StructuralIndex): string {
  const lines = [
    "=== DOCUMENT MAP ===",
    "",
    `Total characters: ${formatCount(text.length)}`,
    `Pages identified: ${structure.pages.length}`,
    `Chapters identified: ${structure.chapters.length}`,
  ];

  if (structure.chapters.length > 0) {
    lines.push("", "CHAPTERS FOUND:");
    for (const chapter of structure.chapters.slice(0, MAP_CHAPTER_LIMIT)) {
      lines.push(`• Chapter ${chapter.number}: ${chapter.title.slice(0, MAP_TITLE_LIMIT)}`);
    }
  }

  const firstPage = structure.pages[0];
  const lastPage = structure.pages[structure.pages.length - 1];
  if (firstPage && lastPage) {
    lines.push("", "PAGES IDENTIFIED:", `From page ${firstPage.number} to ${lastPage.number}`);
  }

  const toc = structure.tableOfContents[0];
  if (toc) {
    lines.push("", "TABLE OF CONTENTS FOUND:", toc.context.slice(0, MAP_TOC_PREVIEW_LIMIT));
  }

  return lines.join("\n");
}
