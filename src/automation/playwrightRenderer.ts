import type { BrowserContext, Page } from "playwright-core";
import type { StabilizationSettings } from "../config";
import type { Clock } from "../core/timing";
import { systemClock } from "../core/timing";
import { waitUntilStable } from "../extract/stabilization";
import type { Logger } from "../observability";
import type { DocumentRenderer, PdfRenderOptions } from "./types";

export interface SnapshotRendererSettings {
  contentSelector: string;
  stabilization: StabilizationSettings;
  loadTimeoutMs: number;
  logger: Logger;
  clock?: Clock;
}

function escapeAttribute(value: string): string {
  return value.replace(/&/g, "&amp;").replace(/"/g, "&quot;").replace(/</g, "&lt;");
}

/** Wraps a serialized surface in a standalone document whose relative URLs resolve against `baseUrl`. */
export function buildSnapshotDocument(fragment: string, baseUrl?: string): string {
  const base = baseUrl ? `<base href="${escapeAttribute(baseUrl)}">` : "";
  return `<!DOCTYPE html><html><head><meta charset="utf-8">${base}</head><body>${fragment}</body></html>`;
}

/**
 * Prints a surface snapshot from its own short-lived page, so the listing
 * page's layout never leaks into the document.
 */
export class PlaywrightDocumentRenderer implements DocumentRenderer {
  private readonly context: BrowserContext;
  private readonly settings: SnapshotRendererSettings;
  private readonly clock: Clock;

  constructor(context: BrowserContext, settings: SnapshotRendererSettings) {
    this.context = context;
    this.settings = settings;
    this.clock = settings.clock ?? systemClock;
  }

  async renderSnapshot(fragment: string, options: PdfRenderOptions): Promise<Buffer> {
    const page = await this.context.newPage();
    try {
      await page.setContent(buildSnapshotDocument(fragment, options.baseUrl), {
        waitUntil: "load",
        timeout: this.settings.loadTimeoutMs,
      });

      const result = await waitUntilStable(() => this.contentHeight(page), this.settings.stabilization, this.clock);
      if (result.status === "timedOut") {
        this.settings.logger.warn("snapshot_content_not_stable", { lastValue: result.lastValue, samples: result.samples });
      }

      await page.evaluate(
        ({ selector, widthPx }) => {
          const content = document.querySelector(selector);
          if (content instanceof HTMLElement) {
            content.style.width = `${widthPx}px`;
            content.style.height = `${content.scrollHeight}px`;
          }
        },
        { selector: this.settings.contentSelector, widthPx: options.widthPx },
      );

      return await page.pdf({
        format: options.pageFormat,
        printBackground: true,
        margin: options.margins,
        preferCSSPageSize: false,
      });
    } finally {
      await page.close();
    }
  }

  private contentHeight(page: Page): Promise<number> {
    return page.evaluate(
      (selector) => document.querySelector(selector)?.scrollHeight ?? 0,
      this.settings.contentSelector,
    );
  }
}
