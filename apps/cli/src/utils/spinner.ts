import ora from "ora";

import { currentLevel, isJsonMode } from "./logger";

/**
 * Creates a spinner that stays silent in JSON or quiet mode so automated
 * consumers are not spammed with terminal animations.
 */
export function createSpinner(text: string) {
  const isQuiet = currentLevel() === "error";
  return ora({ text, isSilent: isJsonMode() || isQuiet }).start();
}
