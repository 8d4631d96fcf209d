import type { Tool as ToolDescriptor } from "@modelcontextprotocol/sdk/types.js";
import type { Page } from "playwright-core";
import type { z } from "zod";

/** The slice of a Playwright page the tools drive. */
export type ToolPage = Pick<Page, "goto" | "title" | "click" | "fill" | "innerText">;

export type InputType = z.ZodTypeAny;

export type ToolSchema<Input extends InputType> = {
  name: string;
  description: string;
  /** Validates `params.arguments` before the action runs. */
  inputSchema: Input;
  /** Advertised verbatim by `tools/list`. */
  jsonSchema: ToolDescriptor["inputSchema"];
};

export type ToolOutput = Record<string, string>;

export type Tool<Input extends InputType = InputType> = {
  schema: ToolSchema<Input>;
  handle(page: ToolPage, params: z.output<Input>): Promise<ToolOutput>;
};

export function defineTool<Input extends InputType>(
  tool: Tool<Input>,
): Tool<Input> {
  return tool;
}

export function describeTool(tool: Tool): ToolDescriptor {
  return {
    name: tool.schema.name,
    description: tool.schema.description,
    inputSchema: tool.schema.jsonSchema,
  };
}
