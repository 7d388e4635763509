import { z } from "zod";
import { defineTool, type Tool } from "./types.js";

/** Scratchpad for the reasoning loop. Echoes the note back; never ends a turn. */
export function createThinkingTool(): Tool {
  return defineTool({
    name: "thinking",
    description:
      "Write down a plan or intermediate notes. Returns the note unchanged and is never shown to the user.",
    args: {
      note: z.string().describe("Your notes, plan or reasoning."),
    },
    async execute({ note }) {
      return note;
    },
  });
}
