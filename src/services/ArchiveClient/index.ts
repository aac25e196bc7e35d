export * from "./ArchiveClient";
export * from "./ArchiveClientHttp";
export * from "./Netrc";
