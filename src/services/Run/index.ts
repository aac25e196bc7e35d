export * from "./RunExecutor";
export * from "./RunPlanner";
export * from "./StereoSpacing";
export * from "./ToolRunner";
export * from "./ToolRunnerExeca";
