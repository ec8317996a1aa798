export * from "./playwrightListing";
export * from "./playwrightRenderer";
export * from "./remoteDocument";
export * from "./types";
