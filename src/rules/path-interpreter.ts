import { ParseError } from "../core/errors";
import type { IPathInterpreter } from "../core/interfaces";
import type { Directive, FaultDirective, ForwardDirective, HttpScheme } from "../core/models";

const FAULT_PREFIX = "/fault/";
const PROXY_PREFIX = "/proxy/";
const INTEGER = /^[+-]?\d+$/;

const SCHEME_SEGMENTS = new Map<string, HttpScheme>([
  ["http:", "http"],
  ["https:", "https"],
]);

/**
 * Reads one directive off the front of a path:
 *
 * - `/` or empty: terminal
 * - `/fault/<code>[/<percentage>]...`: fault gate
 * - `/proxy/[http[s]://]host[:port]...`: forward to the next hop
 *
 * Whatever follows the directive comes back as `remainingPath`, which the
 * executor feeds back in here once the current directive has been handled.
 */
export class PathInterpreter implements IPathInterpreter {
  parse(path: string): Directive {
    if (path === "" || path === "/") {
      return { kind: "terminal", remainingPath: "/" };
    }

    const parts = path.split("/");

    if (path.startsWith(FAULT_PREFIX)) {
      return this.parseFault(parts);
    }

    if (path.startsWith(PROXY_PREFIX)) {
      return this.parseForward(parts);
    }

    throw new ParseError("UnrecognizedPrefix", "invalid path: must start with /proxy/ or /fault/");
  }

  private parseFault(parts: string[]): FaultDirective {
    const codeSegment = parts[2];
    if (!INTEGER.test(codeSegment)) {
      throw new ParseError("InvalidFaultCode", "invalid fault code: must be a number");
    }

    const statusCode = Number.parseInt(codeSegment, 10);
    if (statusCode < 400 || statusCode > 599) {
      throw new ParseError("InvalidFaultCode", "invalid fault code: must be 400-599");
    }

    let percentage = 100;
    let consumed = 3;

    // A non-numeric segment here is the next directive, not a percentage.
    const percentageSegment = parts[3];
    if (percentageSegment !== undefined && INTEGER.test(percentageSegment)) {
      percentage = Number.parseInt(percentageSegment, 10);
      consumed = 4;
    }

    if (percentage < 0 || percentage > 100) {
      throw new ParseError("InvalidPercentage", "invalid fault percentage: must be 0-100");
    }

    return {
      kind: "fault",
      statusCode,
      percentage,
      remainingPath: this.remaining(parts, consumed),
    };
  }

  private parseForward(parts: string[]): ForwardDirective {
    let scheme: HttpScheme = "http";
    let hostIndex = 2;

    const explicitScheme = SCHEME_SEGMENTS.get(parts[2].toLowerCase());
    if (explicitScheme) {
      scheme = explicitScheme;
      // `https://host` splits into "https:", "", "host"; a cleaned `https:/host` has no gap
      hostIndex = parts[3] === "" && parts.length > 4 ? 4 : 3;
    }

    const nextHop = parts[hostIndex] ?? "";
    if (nextHop === "") {
      throw new ParseError("EmptyServiceName", "invalid path: empty service name");
    }

    return {
      kind: "forward",
      nextHop,
      scheme,
      remainingPath: this.remaining(parts, hostIndex + 1),
    };
  }

  private remaining(parts: string[], consumed: number): string {
    return parts.length > consumed ? `/${parts.slice(consumed).join("/")}` : "/";
  }
}
