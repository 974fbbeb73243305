export * from "./normalizers.js";
export * from "./tokenizers.js";
export * from "./textAnalyzer.js";
export * from "./memoryInvertedIndex.js";
export * from "./queryEvaluator.js";
export * from "./reservoirSelector.js";
export * from "./topScoreSelector.js";
export * from "./selectors.js";
export * from "./memorySearchEngine.js";
