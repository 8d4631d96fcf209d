import { z } from "zod";
import { defineTool } from "./tool.js";

const OpenUrlInputSchema = z.object({
  url: z.string().describe("The URL to open"),
});

const openUrlTool = defineTool({
  schema: {
    name: "open_url",
    description: "Open a URL in the browser",
    inputSchema: OpenUrlInputSchema,
    jsonSchema: {
      type: "object",
      properties: { url: { type: "string" } },
      required: ["url"],
    },
  },

  handle: async (page, params) => {
    await page.goto(params.url);
    return { title: await page.title(), url: params.url };
  },
});

export default openUrlTool;
