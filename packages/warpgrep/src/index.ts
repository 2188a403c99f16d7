export * from "./WarpGrep.js";
export * from "./config/Config.js";
export * from "./config/ConfigLoader.js";
export * from "./prompts/SearchPrompts.js";
export * from "./protocol/ToolCallTypes.js";
export * from "./protocol/ToolCallParser.js";
export * from "./providers/ProviderTypes.js";
export * from "./providers/OpenAiCompatibleProvider.js";
export * from "./runtime/EventFormatter.js";
export * from "./runtime/ResultAggregator.js";
export * from "./runtime/RunLogger.js";
export * from "./runtime/SearchErrors.js";
export * from "./runtime/SearchOrchestrator.js";
export * from "./runtime/SearchSession.js";
export * from "./runtime/SearchTypes.js";
export * from "./tools/ToolTypes.js";
export * from "./tools/ToolExecutor.js";
export * from "./tools/filesystem/FileTools.js";
export * from "./tools/filesystem/LineRanges.js";
export * from "./tools/filesystem/RepoStructure.js";
export * from "./tools/search/GrepTool.js";
