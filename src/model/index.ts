export * from "./content.js";
export * from "./tool.js";
export * from "./tool-choice.js";
export * from "./parameter-schema.js";
export * from "./message.js";
export * from "./request.js";
export * from "./response.js";
export * from "./lora.js";
