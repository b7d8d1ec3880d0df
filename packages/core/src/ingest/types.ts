export type PdfTextItem = {
  str: string;
  transform: number[]; // [a, b, c, d, e, f]; e/f is the baseline origin (PDF bottom-left)
  width?: number;
  height?: number;
  fontName?: string;
};

export type PdfPageContent = {
  width: number;
  height: number;
  items: PdfTextItem[];
  // fontName -> font family, as reported by the PDF engine
  fonts: Record<string, string>;
};

export interface PdfDocumentSource {
  pageCount: number;
  getPage(index: number): Promise<PdfPageContent>; // 0-based
  close(): Promise<void>;
}

export type PdfLoader = (data: Uint8Array) => Promise<PdfDocumentSource>;

export type ExtractOptions = {
  maxBytes?: number;
  loader?: PdfLoader;
};
