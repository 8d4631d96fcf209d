import { z } from "zod";
import { defineTool } from "./tool.js";

const FillFormInputSchema = z.object({
  selector: z.string().describe("CSS selector of the input to fill"),
  text: z.string().describe("Value to set"),
});

const fillFormTool = defineTool({
  schema: {
    name: "fill_form",
    description: "Fill a form field",
    inputSchema: FillFormInputSchema,
    jsonSchema: {
      type: "object",
      properties: {
        selector: { type: "string" },
        text: { type: "string" },
      },
      required: ["selector", "text"],
    },
  },

  handle: async (page, params) => {
    await page.fill(params.selector, params.text);
    return { status: "filled", selector: params.selector, text: params.text };
  },
});

export default fillFormTool;
