import { STATUS_CODES } from "node:http";
import { ParseError } from "./errors";
import type { Directive, DirectiveSummary, ForwardDirective } from "./models";

const DURATION_UNITS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
};

export function buildTargetUrl(directive: ForwardDirective): string {
  return `${directive.scheme}://${directive.nextHop}${directive.remainingPath}`;
}

export function reasonPhrase(statusCode: number): string {
  return STATUS_CODES[statusCode] ?? "Unknown Error";
}

export function summarizeDirective(directive: Directive): DirectiveSummary {
  switch (directive.kind) {
    case "terminal":
      return { nextHop: "", remainingPath: directive.remainingPath, isTerminal: true, isFault: false };
    case "fault":
      return {
        nextHop: "",
        remainingPath: directive.remainingPath,
        isTerminal: false,
        isFault: true,
        faultStatusCode: directive.statusCode,
        faultPercentage: directive.percentage,
      };
    case "forward":
      return { nextHop: directive.nextHop, remainingPath: directive.remainingPath, isTerminal: false, isFault: false };
  }
}

/**
 * Parses durations written as `500ms`, `30s`, `1m30s`, `2h` or a bare number
 * of milliseconds. Returns null when the text is not a duration.
 */
export function parseDuration(input: string | number): number | null {
  if (typeof input === "number") {
    return Number.isFinite(input) ? input : null;
  }

  const text = input.trim();
  if (/^-?\d+$/.test(text)) {
    return Number(text);
  }

  const match = /^(-?)((?:\d+(?:\.\d+)?(?:ms|s|m|h))+)$/.exec(text);
  if (!match) {
    return null;
  }

  let total = 0;
  for (const part of match[2].matchAll(/(\d+(?:\.\d+)?)(ms|s|m|h)/g)) {
    total += Number(part[1]) * DURATION_UNITS[part[2]];
  }

  return match[1] === "-" ? -total : total;
}

export function firstHeaderValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

/** Percent-decodes a request path before it is read as directives. */
export function decodePath(path: string): string {
  try {
    return decodeURIComponent(path);
  } catch {
    throw new ParseError("InvalidEncoding", "invalid path: malformed percent-encoding");
  }
}
