export * from "./FlightVerifyService";
