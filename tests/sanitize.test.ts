import { describe, expect, it } from "vitest";
import { buildDocumentIdentity, sanitizeFilename } from "../src/extract/sanitize";

const FIELDS = { displayNameField: "nombre", identityField: "folio_unico" };

describe("sanitizeFilename", () => {
  it("replaces path separators and punctuation but keeps accented letters", () => {
    expect(sanitizeFilename("María/Pérez*2024")).toBe("María_Pérez_2024");
  });

  it("keeps dashes, dots, underscores, spaces and combining marks", () => {
    expect(sanitizeFilename("Jose\u0301 A. de-la_Cruz")).toBe("Jose\u0301 A. de-la_Cruz");
  });

  it("replaces a whole astral character with a single underscore", () => {
    expect(sanitizeFilename("x😀y")).toBe("x_y");
  });

  it("truncates to the maximum length in code points", () => {
    expect(sanitizeFilename("a".repeat(200))).toHaveLength(120);
    expect(sanitizeFilename("abcdefg", 5)).toBe("abcde");
  });
});

describe("buildDocumentIdentity", () => {
  it("labels by display name and identity folio", () => {
    const identity = buildDocumentIdentity(
      [
        ["folio_unico", "F/77"],
        ["nombre", "Ana Sofía"],
      ],
      FIELDS,
    );

    expect(identity).toEqual({ displayName: "Ana Sofía", identityFolio: "F/77", label: "Ana Sofía_F_77" });
  });

  it("falls back to unknown when the name is empty", () => {
    const identity = buildDocumentIdentity([["folio_unico", "F-9"]], FIELDS);

    expect(identity.label).toBe("unknown_F-9");
    expect(identity.displayName).toBe("");
  });
});
