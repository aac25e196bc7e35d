export * from "./SpecialCases";
export * from "./SpecialCaseStoreJson";
export * from "./resolveAdjustments";
