/**
 * Markdown rendering for topic bodies.
 */

import { marked, type MarkedOptions } from "marked";

/**
 * GFM with tables and fenced code; single newlines become <br>, as the
 * forum displayed posts. Built fresh per call: the lexer and parser store
 * their tokenizer and renderer on the options they are given, and the
 * global marked defaults stay untouched.
 */
function markdownOptions(): MarkedOptions {
  return { ...marked.getDefaults(), gfm: true, breaks: true };
}

/**
 * Render a topic body to HTML. Pure: the same input always yields the
 * same output.
 */
export function renderMarkdown(source: string): string {
  const options = markdownOptions();
  return marked.parser(marked.lexer(source, options), options);
}
