// Document model
export * from "./document";

// Line tokenizer
export * from "./tokenizer";

// Document parser
export * from "./document-parser";

// Validation
export * from "./validation";

// Merge
export * from "./merge";

// Writer
export * from "./writer";

// Builder
export * from "./builder";

// Harness summary
export * from "./harness";
