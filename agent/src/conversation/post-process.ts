/**
 * Reply cleanup applied to every generated message before it is stored or
 * spoken. Each step after prefix stripping can be turned off.
 */

export interface PostProcessOptions {
  removeAsterisks: boolean;
  /** Drop `[...]` and `(...)` stage directions */
  rpSuppression: boolean;
  /** Keep only the first line */
  newlineCut: boolean;
}

export const EMPTY_REPLY = "I'm not sure how to respond to that.";

const ROLE_PREFIXES = ["Assistant:", "AI:", "Response:", "Reply:"];

export function stripRolePrefixes(text: string): string {
  let result = text;
  for (const prefix of ROLE_PREFIXES) {
    const trimmed = result.trim();
    if (trimmed.startsWith(prefix)) result = trimmed.slice(prefix.length).trim();
  }
  return result;
}

/** Asterisk and `[...]`/`(...)` removal, as switched on */
export function stripStageDirections(text: string, options: PostProcessOptions): string {
  let result = text;
  if (options.removeAsterisks) result = result.replace(/\*/g, "");
  if (options.rpSuppression) result = result.replace(/\[.*?\]/g, "").replace(/\(.*?\)/g, "");
  return result;
}

/** Cleaned reply, or EMPTY_REPLY when nothing is left */
export function postProcess(text: string, options: PostProcessOptions): string {
  let result = stripStageDirections(stripRolePrefixes(text), options);
  if (options.newlineCut) result = result.split("\n")[0];
  return result.trim() || EMPTY_REPLY;
}
