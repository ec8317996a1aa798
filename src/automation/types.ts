export type SurfaceKind = "restricted" | "detail";

export interface PdfRenderOptions {
  pageFormat: string;
  margins: { top: string; bottom: string; left: string; right: string };
  widthPx: number;
  baseUrl?: string;
}

/** An on-demand overlay showing one item's full record. */
export interface DetailSurface {
  readonly kind: SurfaceKind;
  /** Rendered content height in pixels; throws when the content region is missing. */
  measureContent(): Promise<number>;
  fitToContent(): Promise<void>;
  snapshotHtml(): Promise<string>;
  findDocumentLink(): Promise<string | undefined>;
  close(): Promise<void>;
}

export interface ListingItem {
  readRowHtml(): Promise<string>;
  /** Resolves false when the row has no detail trigger. */
  activateDetail(timeoutMs: number): Promise<boolean>;
}

export interface ListingSession {
  readonly url: string;
  selectPage(pageNumber: number): Promise<boolean>;
  enumerateItems(): Promise<ListingItem[]>;
  detectTotalPages(): Promise<number | undefined>;
  waitForSurface(kind: SurfaceKind, timeoutMs: number): Promise<DetailSurface | null>;
}

export interface DocumentRenderer {
  renderSnapshot(fragment: string, options: PdfRenderOptions): Promise<Buffer>;
}

export interface ListingAutomation {
  openListing(url: string): Promise<ListingSession>;
  readonly renderer: DocumentRenderer;
  close(): Promise<void>;
}
