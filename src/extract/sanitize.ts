import type { ItemMetadata } from "../types";
import { metadataValue } from "../types";

export const DEFAULT_MAX_FILENAME_LENGTH = 120;

const DISALLOWED = /[^\p{L}\p{M}\p{N}\-_. ]/gu;

export function sanitizeFilename(value: string, maxLength = DEFAULT_MAX_FILENAME_LENGTH): string {
  const replaced = value.replace(DISALLOWED, "_");
  return Array.from(replaced).slice(0, maxLength).join("");
}

export interface DocumentLabelFields {
  displayNameField: string;
  identityField: string;
}

export interface DocumentIdentity {
  displayName: string;
  identityFolio: string;
  label: string;
}

/** `{displayName}_{identityFolio}` sanitized; names are not unique across items. */
export function buildDocumentIdentity(
  metadata: ItemMetadata,
  fields: DocumentLabelFields,
  maxLength = DEFAULT_MAX_FILENAME_LENGTH,
): DocumentIdentity {
  const displayName = metadataValue(metadata, fields.displayNameField);
  const identityFolio = metadataValue(metadata, fields.identityField);
  return {
    displayName,
    identityFolio,
    label: sanitizeFilename(`${displayName || "unknown"}_${identityFolio}`, maxLength),
  };
}
