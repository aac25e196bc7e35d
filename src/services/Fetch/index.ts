export * from "./BatchDownloader";
export * from "./FetchValidator";
export * from "./FlightFetchService";
