/**
 * Command template expansion
 */

import { ConfigError } from "../../utils/errors";

export const PLACEHOLDERS = ["$binary", "@options", "$source", "$destination"] as const;

export type Placeholder = (typeof PLACEHOLDERS)[number];

const KNOWN: ReadonlySet<string> = new Set(PLACEHOLDERS);

export interface TemplateBinding {
  binary: string;
  /** Spliced in order at `@options` */
  options: string[];
  source: string;
  /** Absolute destination path */
  destination: string;
}

function isPlaceholder(token: string): token is Placeholder {
  return KNOWN.has(token);
}

function looksLikePlaceholder(token: string): boolean {
  return token.startsWith("$") || token.startsWith("@");
}

/**
 * Tokens that start with `$` or `@` but are not known placeholders
 */
export function findUnknownPlaceholders(template: string[]): string[] {
  return template.filter((token) => looksLikePlaceholder(token) && !isPlaceholder(token));
}

/**
 * Turn a template into an argument vector. Literals pass through unchanged.
 */
export function expandCommandTemplate(template: string[], binding: TemplateBinding): string[] {
  const argv: string[] = [];

  for (const token of template) {
    if (!looksLikePlaceholder(token)) {
      argv.push(token);
      continue;
    }

    switch (token) {
      case "$binary":
        argv.push(binding.binary);
        break;
      case "@options":
        argv.push(...binding.options);
        break;
      case "$source":
        argv.push(binding.source);
        break;
      case "$destination":
        argv.push(binding.destination);
        break;
      default:
        throw new ConfigError(`Unknown command part: ${token}`);
    }
  }

  return argv;
}
