/**
 * Reads a captured image into the base64 attachment the LLM client sends.
 */

import { promises as fs } from "fs";
import * as path from "path";
import type { LLMMessage } from "../llm/types.js";

export type ImageAttachment = NonNullable<LLMMessage["images"]>[number];

export function imageMediaType(filePath: string): ImageAttachment["mediaType"] {
  return path.extname(filePath).toLowerCase() === ".png" ? "image/png" : "image/jpeg";
}

export async function loadImage(filePath: string): Promise<ImageAttachment> {
  const data = await fs.readFile(filePath);
  return { base64: data.toString("base64"), mediaType: imageMediaType(filePath) };
}
