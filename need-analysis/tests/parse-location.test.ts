import { describe, it, expect } from "vitest";
import { cleanCity, extractCity, lookupCity, parseLocation } from "../src/utils/parse-location.ts";

describe("parseLocation", () => {
  it("canonicalizes a known city with a region suffix", () => {
    expect(parseLocation("München, Bayern")).toBe("Munich");
  });

  it("keeps an unknown city as written", () => {
    expect(parseLocation("Ulm, Germany")).toBe("Ulm");
  });

  it("drops a hybrid marker in parentheses", () => {
    expect(parseLocation("Freiburg im Breisgau (hybrid)")).toBe("Freiburg im Breisgau");
  });

  it("returns null for remote-only locations", () => {
    expect(parseLocation("Remote")).toBeNull();
  });

  it("handles empty string", () => {
    expect(parseLocation("")).toBeNull();
    expect(parseLocation("   ")).toBeNull();
  });
});

describe("cleanCity", () => {
  it("stops at the first lowercase word", () => {
    expect(cleanCity("Ulm und Umgebung")).toBe("Ulm");
  });

  it("keeps name connectors", () => {
    expect(cleanCity("Frankfurt am Main - Innenstadt")).toBe("Frankfurt am Main");
  });
});

describe("lookupCity", () => {
  it("matches aliases case-insensitively", () => {
    expect(lookupCity("frankfurt am main")?.name).toBe("Frankfurt");
    expect(lookupCity("KÖLN")?.name).toBe("Cologne");
  });

  it("returns null for cities outside the table", () => {
    expect(lookupCity("Ulm")).toBeNull();
  });
});

describe("extractCity", () => {
  it("prefers a labeled location line", () => {
    const lines = ["Wir haben Büros in Berlin und Hamburg", "Arbeitsort: Köln"];
    expect(extractCity(lines, lines.join("\n"))).toBe("Cologne");
  });

  it("falls back to the earliest known city in the text", () => {
    const text = "Join our team in Hamburg or Berlin";
    expect(extractCity([text], text)).toBe("Hamburg");
  });

  it("returns null when no city is mentioned", () => {
    const text = "Fully remote position";
    expect(extractCity([text], text)).toBeNull();
  });
});
