export * from "./IndexFile";
export * from "./IndexParser";
