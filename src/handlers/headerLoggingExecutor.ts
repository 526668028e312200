import type { IRequestExecutor } from "../core/interfaces";
import type { Directive, ExecutionContext, ExecutionRequest, ExecutionResult } from "../core/models";

/**
 * Logs inbound request headers and, for relays, the next hop's response
 * headers. Sensitive values are masked by the logger's redact paths, not here.
 */
export class HeaderLoggingExecutor implements IRequestExecutor {
  constructor(private inner: IRequestExecutor) { }

  async execute(
    request: ExecutionRequest,
    directive: Directive,
    context: ExecutionContext
  ): Promise<ExecutionResult> {
    context.logger.info({ request_headers: request.headers }, "Request headers");

    const result = await this.inner.execute(request, directive, context);

    if (result.kind === "relay") {
      context.logger.info({ upstream_headers: result.upstream.headers }, "Upstream response headers");
    }

    return result;
  }
}
