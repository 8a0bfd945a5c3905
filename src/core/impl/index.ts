export * from "./arrayHeap.js";
export * from "./minHeapTopK.js";
export * from "./memoryTrie.js";
export * from "./bestFirstSearch.js";
export * from "./trieAutocompleter.js";
export * from "./sortedArrayAutocompleter.js";
export * from "./bruteForceAutocompleter.js";
export * from "./queryEngine.js";
