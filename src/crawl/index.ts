export * from "./coordinator";
export * from "./rowParser";
