export * from "./LidarMatcher";
