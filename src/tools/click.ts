import { z } from "zod";
import { defineTool } from "./tool.js";

const ClickInputSchema = z.object({
  selector: z.string().describe("CSS selector of the element to click"),
});

const clickTool = defineTool({
  schema: {
    name: "click",
    description: "Click an element by CSS selector",
    inputSchema: ClickInputSchema,
    jsonSchema: {
      type: "object",
      properties: { selector: { type: "string" } },
      required: ["selector"],
    },
  },

  handle: async (page, params) => {
    // Playwright clicks the first element matching the selector.
    await page.click(params.selector);
    return { status: "clicked", selector: params.selector };
  },
});

export default clickTool;
