import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import type { AppConfig, ConfigOverrides } from "./types";

const DEFAULT_CONFIG: AppConfig = {
  listingUrl: "https://consultapublicarnpdno.segob.gob.mx/consulta",
  headless: true,
  browserExecutablePath: undefined,
  browserChannel: undefined,
  ignoreHttpsErrors: false,
  ledgerBackend: "csv",
  sinkType: "local_jsonl",
  verifyOutputOnResume: true,
  itemDelayMs: 120,
  pageDelayMs: 500,
  outputs: {
    documentsDir: "data/documents",
    ledgerPath: "data/download_log.csv",
    metadataPath: "data/metadata.csv",
    sqlitePath: "data/ledger.sqlite",
    manifestPath: "data/manifests/outcomes.jsonl",
  },
  timeouts: {
    navigationMs: 30_000,
    triggerMs: 10_000,
    restrictedProbeMs: 3_000,
    surfaceMs: 20_000,
    captureMs: 60_000,
    pageSelectMs: 10_000,
    graceDelayMs: 4_000,
    layoutSettleMs: 3_000,
    pageSettleMs: 1_000,
  },
  stabilization: {
    sampleIntervalMs: 300,
    requiredStableSamples: 3,
    timeoutMs: 15_000,
  },
  capture: {
    strategy: "snapshot",
    pageFormat: "A4",
    margins: { top: "10px", bottom: "10px", left: "10px", right: "10px" },
    snapshotWidthPx: 800,
    maxFilenameLength: 120,
  },
  site: {
    rowSelector: "table tbody tr",
    listViewButtonText: "Ver Lista",
    detailTriggerSelector: "a[data-bs-toggle='modal']",
    detailSurfaceSelector: "div.p-dialog[aria-modal='true']",
    detailContentSelector: ".p-dialog-content",
    detailCloseSelector: "img[alt='Cerrar']",
    restrictedSurfaceSelector: "div.modal-content:has-text('CONFIDENCIAL')",
    restrictedCloseSelector: ".icono-modal-cerrar",
    snapshotContentSelector: "div.modal-body",
    documentLinkSelector: "a.icon-footer-modal-pdf",
    paginatorPageSelector: "span.p-paginator-pages button.p-paginator-page",
    paginatorCurrentSelector: "span.p-paginator-pages button.p-highlight",
    paginatorNextSelector: "button.p-paginator-next",
    metadataFields: [
      "folio_unico",
      "nombre",
      "primer_apellido",
      "segundo_apellido",
      "edad_actual",
      "sexo",
      "estatus_desaparicion",
      "fecha_hechos",
      "entidad_hechos",
      "informacion_reservada",
      "boletin",
    ],
    identityField: "folio_unico",
    displayNameField: "nombre",
  },
};

const positiveInt = z.number().int().positive();
const nonNegativeInt = z.number().int().nonnegative();

const ConfigFileSchema = z.object({
  listingUrl: z.string().url().optional(),
  headless: z.boolean().optional(),
  browserExecutablePath: z.string().min(1).optional(),
  browserChannel: z.string().min(1).optional(),
  ignoreHttpsErrors: z.boolean().optional(),
  ledgerBackend: z.enum(["csv", "sqlite"]).optional(),
  sinkType: z.enum(["local_jsonl", "none"]).optional(),
  verifyOutputOnResume: z.boolean().optional(),
  itemDelayMs: nonNegativeInt.optional(),
  pageDelayMs: nonNegativeInt.optional(),
  outputs: z
    .object({
      documentsDir: z.string().min(1),
      ledgerPath: z.string().min(1),
      metadataPath: z.string().min(1),
      sqlitePath: z.string().min(1),
      manifestPath: z.string().min(1),
    })
    .partial()
    .optional(),
  timeouts: z
    .object({
      navigationMs: positiveInt,
      triggerMs: positiveInt,
      restrictedProbeMs: positiveInt,
      surfaceMs: positiveInt,
      captureMs: positiveInt,
      pageSelectMs: positiveInt,
      graceDelayMs: nonNegativeInt,
      layoutSettleMs: nonNegativeInt,
      pageSettleMs: nonNegativeInt,
    })
    .partial()
    .optional(),
  stabilization: z
    .object({
      sampleIntervalMs: positiveInt,
      requiredStableSamples: positiveInt,
      timeoutMs: positiveInt,
    })
    .partial()
    .optional(),
  capture: z
    .object({
      strategy: z.enum(["snapshot", "remote_first"]),
      pageFormat: z.string().min(1),
      margins: z
        .object({
          top: z.string(),
          bottom: z.string(),
          left: z.string(),
          right: z.string(),
        })
        .partial(),
      snapshotWidthPx: positiveInt,
      maxFilenameLength: positiveInt,
    })
    .partial()
    .optional(),
  site: z
    .object({
      rowSelector: z.string().min(1),
      listViewButtonText: z.string(),
      detailTriggerSelector: z.string().min(1),
      detailSurfaceSelector: z.string().min(1),
      detailContentSelector: z.string().min(1),
      detailCloseSelector: z.string().min(1),
      restrictedSurfaceSelector: z.string().min(1),
      restrictedCloseSelector: z.string().min(1),
      snapshotContentSelector: z.string().min(1),
      documentLinkSelector: z.string().min(1),
      paginatorPageSelector: z.string().min(1),
      paginatorCurrentSelector: z.string().min(1),
      paginatorNextSelector: z.string().min(1),
      metadataFields: z.array(z.string().min(1)).min(1),
      identityField: z.string().min(1),
      displayNameField: z.string().min(1),
    })
    .partial()
    .optional(),
});

export class ConfigError extends Error {}

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new ConfigError(`Config file not found: ${absolutePath}`);
  }

  const raw = fs.readFileSync(absolutePath, "utf-8");
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Config file is not valid JSON: ${absolutePath}`, { cause: error });
  }

  const parsed = ConfigFileSchema.safeParse(json ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`);
    throw new ConfigError(`Invalid config file ${absolutePath}: ${issues.join("; ")}`);
  }
  return parsed.data;
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return fallback;
}

function mergeConfig(base: AppConfig, overrides: ConfigOverrides): AppConfig {
  return {
    ...base,
    ...overrides,
    outputs: { ...base.outputs, ...(overrides.outputs ?? {}) },
    timeouts: { ...base.timeouts, ...(overrides.timeouts ?? {}) },
    stabilization: { ...base.stabilization, ...(overrides.stabilization ?? {}) },
    capture: {
      ...base.capture,
      ...(overrides.capture ?? {}),
      margins: { ...base.capture.margins, ...(overrides.capture?.margins ?? {}) },
    },
    site: { ...base.site, ...(overrides.site ?? {}) },
  };
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const merged = mergeConfig(DEFAULT_CONFIG, readConfigFile(configPath));
  const outputDir = env.OUTPUT_DIR;

  return {
    ...merged,
    listingUrl: env.LISTING_URL ?? merged.listingUrl,
    headless: toBool(env.HEADLESS, merged.headless),
    browserExecutablePath: env.BROWSER_EXECUTABLE_PATH ?? merged.browserExecutablePath,
    browserChannel: env.BROWSER_CHANNEL ?? merged.browserChannel,
    ignoreHttpsErrors: toBool(env.IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),
    ledgerBackend: env.LEDGER_BACKEND === "csv" || env.LEDGER_BACKEND === "sqlite" ? env.LEDGER_BACKEND : merged.ledgerBackend,
    sinkType: env.SINK_TYPE === "local_jsonl" || env.SINK_TYPE === "none" ? env.SINK_TYPE : merged.sinkType,
    verifyOutputOnResume: toBool(env.VERIFY_OUTPUT_ON_RESUME, merged.verifyOutputOnResume),
    outputs: {
      documentsDir: outputDir ?? merged.outputs.documentsDir,
      ledgerPath: env.LEDGER_PATH ?? merged.outputs.ledgerPath,
      metadataPath: env.METADATA_PATH ?? merged.outputs.metadataPath,
      sqlitePath: env.SQLITE_PATH ?? merged.outputs.sqlitePath,
      manifestPath: env.MANIFEST_PATH ?? merged.outputs.manifestPath,
    },
    timeouts: {
      ...merged.timeouts,
      navigationMs: toInt(env.NAVIGATION_TIMEOUT_MS, merged.timeouts.navigationMs),
    },
    capture: {
      ...merged.capture,
      strategy:
        env.CAPTURE_STRATEGY === "snapshot" || env.CAPTURE_STRATEGY === "remote_first"
          ? env.CAPTURE_STRATEGY
          : merged.capture.strategy,
    },
  };
}

export { DEFAULT_CONFIG };
