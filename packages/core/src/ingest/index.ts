export { extractElements, extractElementsFromBuffer, elementsFromPage, loadWithPdfjs } from "./pdf";
export type { ExtractOptions, PdfDocumentSource, PdfLoader, PdfPageContent, PdfTextItem } from "./types";
