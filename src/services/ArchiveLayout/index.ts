export * from "./ArchiveLayout";
export * from "./ArchiveLayoutNsidc";
