// Interactive fuzzy selection engine

// Entry point
export * from "./select";
// Picker (interaction controller)
export * from "./picker";
// Ranking
export * from "./fuzzy";
export * from "./match-engine";
// Viewport, selection and layout
export * from "./layout";
export * from "./renderer";
export * from "./selection";
export * from "./viewport";
// Terminal, input and errors
export * from "./errors";
export * from "./event-source";
export * from "./keys";
export * from "./terminal";
// Configuration and styling
export * from "./config";
export * from "./theme";
export * from "./utils";
