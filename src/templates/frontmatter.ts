/**
 * Command template frontmatter.
 *
 * Command templates open with a YAML block naming a description and,
 * optionally, the generated script their `{SCRIPT}` placeholder refers to.
 */

import matter from "gray-matter";
import { z } from "zod";
import { SCRIPT_NAMES } from "../config/script-types.js";

export const CommandFrontmatterSchema = z
  .object({
    description: z.string().optional(),
    script: z.enum(SCRIPT_NAMES).optional(),
  })
  .passthrough();
export type CommandFrontmatter = z.infer<typeof CommandFrontmatterSchema>;

export interface ParsedTemplate {
  frontmatter: CommandFrontmatter;
  /** Document body without the frontmatter block. */
  body: string;
}

/**
 * Split a template into frontmatter and body.
 * @throws Error when the frontmatter is not valid YAML or has bad field types.
 */
export function parseTemplate(content: string): ParsedTemplate {
  // Passing options keeps gray-matter from returning its cached copy.
  const parsed = matter(content, {});
  const result = CommandFrontmatterSchema.safeParse(parsed.data);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new Error(`Invalid frontmatter (${issues.join("; ")})`);
  }
  return {
    frontmatter: result.data,
    body: parsed.content,
  };
}
