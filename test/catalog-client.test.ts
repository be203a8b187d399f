import { describe, it, expect, vi, afterEach } from "vitest";
import {
  createCatalogFetcher,
  DEFAULT_CATALOG_CONFIG,
  fetchPart,
  fetchPartWithRetry,
  toPartRecord,
} from "../src/catalog/client.js";
import { CatalogError } from "../src/types.js";
import type { CatalogConfig, Warning } from "../src/types.js";

const CONFIG: CatalogConfig = { ...DEFAULT_CATALOG_CONFIG, retryDelayMs: 0, timeoutMs: 1000 };

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

const PRODUCT = {
  code: 200,
  result: {
    brandNameEn: "Texas Instruments",
    productModel: "TAC5212IRGER",
    encapStandard: "WQFN-24",
    productIntroEn: "Stereo audio codec",
    stockNumber: 1200,
  },
};

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("fetchPart", () => {
  it("maps the product-detail payload onto a catalog part", async () => {
    const fetchMock = vi.fn(async () => jsonResponse(PRODUCT));
    vi.stubGlobal("fetch", fetchMock);

    const part = await fetchPart("C2040", CONFIG);

    expect(part).toEqual({
      manufacturer: "Texas Instruments",
      mpn: "TAC5212IRGER",
      package: "WQFN-24",
      description: "Stereo audio codec",
      stock: 1200,
      productUrl: "https://lcsc.com/product-detail/C2040.html",
    });
    expect(fetchMock).toHaveBeenCalledWith(
      "https://wmsc.lcsc.com/ftps/wm/product/detail?productCode=C2040",
      expect.objectContaining({
        headers: expect.objectContaining({ "User-Agent": "KiCad-BOM-Verify/1.0" }),
      }),
    );
  });

  it("fills missing result fields with empty values", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => jsonResponse({ code: 200, result: { productModel: "X1" } })));
    const part = await fetchPart("C5", CONFIG);
    expect(part).toMatchObject({ manufacturer: "", mpn: "X1", package: "", stock: 0 });
  });

  it("throws a 404 CatalogError when the payload has no product", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => jsonResponse({ code: 404, msg: "not found", result: null })));
    await expect(fetchPart("C9999", CONFIG)).rejects.toMatchObject({
      name: "CatalogError",
      statusCode: 404,
    });
  });

  it("throws a CatalogError carrying the HTTP status", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("busy", { status: 503 })));
    await expect(fetchPart("C1", CONFIG)).rejects.toMatchObject({
      statusCode: 503,
      message: "Catalog returned 503 for C1: busy",
    });
  });

  it("reports an aborted request as a timeout", async () => {
    const abort = new Error("This operation was aborted");
    abort.name = "AbortError";
    vi.stubGlobal("fetch", vi.fn(async () => {
      throw abort;
    }));
    await expect(fetchPart("C1", CONFIG)).rejects.toThrow("Catalog request for C1 timed out after 1000ms");
  });
});

describe("fetchPartWithRetry", () => {
  it("retries once after a server error", async () => {
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce(new Response("oops", { status: 500 }))
      .mockResolvedValueOnce(jsonResponse(PRODUCT));
    vi.stubGlobal("fetch", fetchMock);

    const part = await fetchPartWithRetry("C2040", CONFIG);
    expect(part.mpn).toBe("TAC5212IRGER");
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("gives up after the second failure", async () => {
    const fetchMock = vi.fn(async () => new Response("oops", { status: 500 }));
    vi.stubGlobal("fetch", fetchMock);

    await expect(fetchPartWithRetry("C2040", CONFIG)).rejects.toBeInstanceOf(CatalogError);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("does not retry an unknown product", async () => {
    const fetchMock = vi.fn(async () => jsonResponse({ code: 404, result: null }));
    vi.stubGlobal("fetch", fetchMock);

    await expect(fetchPartWithRetry("C9999", CONFIG)).rejects.toBeInstanceOf(CatalogError);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});

describe("createCatalogFetcher", () => {
  it("returns undefined and records a warning on failure", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => jsonResponse({ code: 404, result: null })));
    const warnings: Warning[] = [];

    const part = await createCatalogFetcher(CONFIG, warnings)("C9999");

    expect(part).toBeUndefined();
    expect(warnings).toHaveLength(1);
    expect(warnings[0]).toMatchObject({ level: "warn", module: "catalog" });
    expect(warnings[0].message).toContain("Failed to fetch C9999");
  });
});

describe("toPartRecord", () => {
  it("maps manufacturer and MPN onto the patcher's attributes", () => {
    expect(
      toPartRecord({
        manufacturer: "Murata",
        mpn: "GRM155R71C104KA88D",
        package: "0402",
        description: "",
        stock: 0,
        productUrl: "",
      }),
    ).toEqual({ displayName: "Murata", code: "GRM155R71C104KA88D" });
  });
});
