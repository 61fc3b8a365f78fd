import type { InputType } from "./types.js";

const INPUT_TYPES: readonly InputType[] = ["single_id", "raw_text", "search_term"];
export const USAGE = "usage: antigen-screen <single_id|raw_text|search_term> <input> [--pathogen <name>]";

export type CliArgs = { inputType: InputType; rawInput: string; pathogenName: string };

/** null when the arguments do not form a valid invocation. */
export function parseArgs(argv: readonly string[]): CliArgs | null {
  const positional: string[] = [];
  let pathogenName: string | undefined;
  for (let i = 0; i < argv.length; i++) {
    if (argv[i] === "--pathogen") {
      pathogenName = argv[i + 1];
      i++;
    } else {
      positional.push(argv[i]);
    }
  }

  const inputType = INPUT_TYPES.find((t) => t === positional[0]);
  const rawInput = positional[1];
  if (inputType === undefined || !rawInput) return null;
  return { inputType, rawInput, pathogenName: pathogenName ?? rawInput.slice(0, 50) };
}
