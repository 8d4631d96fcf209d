import openUrlTool from "./openUrl.js";
import clickTool from "./click.js";
import fillFormTool from "./fillForm.js";
import getTextTool from "./getText.js";
import type { Tool } from "./tool.js";

export { default as openUrlTool } from "./openUrl.js";
export { default as clickTool } from "./click.js";
export { default as fillFormTool } from "./fillForm.js";
export { default as getTextTool } from "./getText.js";

// Order is the order `tools/list` reports.
export const TOOLS: readonly Tool[] = [
  openUrlTool,
  clickTool,
  fillFormTool,
  getTextTool,
];
