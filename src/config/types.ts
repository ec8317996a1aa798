export type LedgerBackend = "csv" | "sqlite";
export type CaptureStrategy = "snapshot" | "remote_first";
export type SinkType = "local_jsonl" | "none";

export interface OutputPaths {
  documentsDir: string;
  ledgerPath: string;
  metadataPath: string;
  sqlitePath: string;
  manifestPath: string;
}

export interface TimeoutSettings {
  navigationMs: number;
  triggerMs: number;
  restrictedProbeMs: number;
  surfaceMs: number;
  captureMs: number;
  pageSelectMs: number;
  graceDelayMs: number;
  layoutSettleMs: number;
  pageSettleMs: number;
}

export interface StabilizationSettings {
  sampleIntervalMs: number;
  requiredStableSamples: number;
  timeoutMs: number;
}

export interface PdfMargins {
  top: string;
  bottom: string;
  left: string;
  right: string;
}

export interface CaptureSettings {
  strategy: CaptureStrategy;
  pageFormat: string;
  margins: PdfMargins;
  snapshotWidthPx: number;
  maxFilenameLength: number;
}

/**
 * Selectors and field layout of the listing being extracted. Everything
 * site-specific lives here so the pipeline never hardcodes markup.
 */
export interface SiteProfile {
  rowSelector: string;
  listViewButtonText: string;
  detailTriggerSelector: string;
  detailSurfaceSelector: string;
  detailContentSelector: string;
  detailCloseSelector: string;
  restrictedSurfaceSelector: string;
  restrictedCloseSelector: string;
  snapshotContentSelector: string;
  documentLinkSelector: string;
  paginatorPageSelector: string;
  paginatorCurrentSelector: string;
  paginatorNextSelector: string;
  metadataFields: string[];
  identityField: string;
  displayNameField: string;
}

export interface AppConfig {
  listingUrl: string;
  headless: boolean;
  browserExecutablePath?: string;
  browserChannel?: string;
  ignoreHttpsErrors: boolean;
  ledgerBackend: LedgerBackend;
  sinkType: SinkType;
  verifyOutputOnResume: boolean;
  itemDelayMs: number;
  pageDelayMs: number;
  outputs: OutputPaths;
  timeouts: TimeoutSettings;
  stabilization: StabilizationSettings;
  capture: CaptureSettings;
  site: SiteProfile;
}

export type ConfigOverrides = Partial<Omit<AppConfig, "outputs" | "timeouts" | "stabilization" | "capture" | "site">> & {
  outputs?: Partial<OutputPaths>;
  timeouts?: Partial<TimeoutSettings>;
  stabilization?: Partial<StabilizationSettings>;
  capture?: Partial<Omit<CaptureSettings, "margins">> & { margins?: Partial<PdfMargins> };
  site?: Partial<SiteProfile>;
};
