export * from "./ImageInspector";
export * from "./ImageInspectorExifTool";
