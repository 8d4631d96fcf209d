import { z } from "zod";
import { defineTool } from "./tool.js";

export const MAX_TEXT_LENGTH = 1000;

/** Cuts on code points so a surrogate pair is never split. */
export function truncateText(text: string, limit: number = MAX_TEXT_LENGTH): string {
  const codePoints = Array.from(text);
  return codePoints.length <= limit ? text : codePoints.slice(0, limit).join("");
}

const getTextTool = defineTool({
  schema: {
    name: "get_text",
    description: "Retrieve the first 1000 characters of the page text",
    inputSchema: z.object({}),
    jsonSchema: { type: "object", properties: {} },
  },

  handle: async (page) => {
    const text = await page.innerText("body");
    return { text: truncateText(text) };
  },
});

export default getTextTool;
