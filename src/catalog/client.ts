// src/catalog/client.ts — HTTP client for the LCSC product-detail API

import { CatalogError } from "../types.js";
import type { CatalogConfig, CatalogPart, PartFetcher, PartRecord, Warning } from "../types.js";

export const DEFAULT_CATALOG_CONFIG: CatalogConfig = {
  urlTemplate: "https://wmsc.lcsc.com/ftps/wm/product/detail?productCode={code}",
  productUrlTemplate: "https://lcsc.com/product-detail/{code}.html",
  userAgent: "KiCad-BOM-Verify/1.0",
  timeoutMs: 10_000,
  requestDelayMs: 300,
  retryDelayMs: 2000,
};

function field(value: unknown, key: string): unknown {
  return typeof value === "object" && value !== null && key in value ? Reflect.get(value, key) : undefined;
}

function text(value: unknown): string {
  return typeof value === "string" ? value : "";
}

function isClientError(err: CatalogError): boolean {
  return err.statusCode !== undefined && err.statusCode >= 400 && err.statusCode < 500;
}

function fillTemplate(template: string, code: string): string {
  return template.replace("{code}", encodeURIComponent(code));
}

/**
 * Fetch one part, retrying once after `retryDelayMs`. Client errors (4xx, or a
 * payload saying the product does not exist) are not retried.
 */
export async function fetchPartWithRetry(
  code: string,
  config: CatalogConfig,
): Promise<CatalogPart> {
  try {
    return await fetchPart(code, config);
  } catch (err) {
    if (err instanceof CatalogError && isClientError(err)) throw err;
    await new Promise((resolve) => setTimeout(resolve, config.retryDelayMs));
    try {
      return await fetchPart(code, config);
    } catch (retryErr) {
      if (retryErr instanceof CatalogError) throw retryErr;
      throw new CatalogError(
        `Catalog request for ${code} failed after retry: ${retryErr instanceof Error ? retryErr.message : String(retryErr)}`,
      );
    }
  }
}

export async function fetchPart(
  code: string,
  config: CatalogConfig,
): Promise<CatalogPart> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), config.timeoutMs);

  try {
    const response = await fetch(fillTemplate(config.urlTemplate, code), {
      signal: controller.signal,
      headers: { "User-Agent": config.userAgent, Accept: "application/json" },
    });

    clearTimeout(timer);

    if (!response.ok) {
      const body = await response.text().catch(() => "");
      throw new CatalogError(
        `Catalog returned ${response.status} for ${code}: ${body.slice(0, 200)}`,
        response.status,
      );
    }

    // { code: 200, msg, result: { brandNameEn, productModel, encapStandard, productIntroEn, stockNumber } }
    const data: unknown = await response.json();
    const status = field(data, "code");
    const result = field(data, "result");
    if (status !== 200 || typeof result !== "object" || result === null) {
      const msg = text(field(data, "msg"));
      throw new CatalogError(
        `Catalog has no product ${code} (code ${typeof status === "number" ? status : "missing"}${msg ? `: ${msg}` : ""})`,
        404,
      );
    }

    const stock = field(result, "stockNumber");
    return {
      manufacturer: text(field(result, "brandNameEn")),
      mpn: text(field(result, "productModel")),
      package: text(field(result, "encapStandard")),
      description: text(field(result, "productIntroEn")),
      stock: typeof stock === "number" ? stock : 0,
      productUrl: fillTemplate(config.productUrlTemplate, code),
    };
  } catch (err) {
    clearTimeout(timer);
    if (err instanceof CatalogError) throw err;
    if (err instanceof Error && err.name === "AbortError") {
      throw new CatalogError(`Catalog request for ${code} timed out after ${config.timeoutMs}ms`);
    }
    if (err instanceof SyntaxError) {
      throw new CatalogError(`Catalog returned invalid JSON for ${code}: ${err.message}`);
    }
    throw err;
  }
}

/**
 * A PartFetcher that turns failures into `undefined` plus a warning.
 */
export function createCatalogFetcher(
  config: CatalogConfig,
  warnings: Warning[],
): PartFetcher {
  return async (code) => {
    try {
      return await fetchPartWithRetry(code, config);
    } catch (err: unknown) {
      warnings.push({
        level: "warn",
        module: "catalog",
        message: `Failed to fetch ${code}: ${err instanceof Error ? err.message : String(err)}`,
      });
      return undefined;
    }
  };
}

export function toPartRecord(part: CatalogPart): PartRecord {
  return { displayName: part.manufacturer, code: part.mpn };
}
