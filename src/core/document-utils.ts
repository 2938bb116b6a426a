import type { ParsedDocument, ParsedPage, TextRun } from '../types/pdf.js';

export function pageRuns(page: ParsedPage): TextRun[] {
  return page.regions.flatMap((region) => region.runs);
}

export function documentRuns(document: ParsedDocument): TextRun[] {
  return document.pages.flatMap(pageRuns);
}

/** Runs of selected pages that the classifier left translatable. */
export function translatableRuns(document: ParsedDocument): TextRun[] {
  return document.pages.filter((page) => page.selected).flatMap(pageRuns).filter((run) => run.isTranslatable);
}
