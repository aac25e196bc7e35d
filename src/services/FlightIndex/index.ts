export * from "./FlightIndexService";
export * from "./FlightIndexServiceDefault";
