import { ParseError, UpstreamError } from "../core/errors";
import type { IPathInterpreter, IProxyClient, IRandomSource, IRequestExecutor } from "../core/interfaces";
import type {
  Directive,
  ExecutionContext,
  ExecutionRequest,
  ExecutionResult,
  FaultDirective,
  ForwardDirective,
} from "../core/models";
import { buildTargetUrl, reasonPhrase, summarizeDirective } from "../core/utils";

export const SUCCESS_MESSAGE = "Request processed successfully";

export class RequestExecutor implements IRequestExecutor {
  constructor(
    private interpreter: IPathInterpreter,
    private proxyClient: IProxyClient,
    private random: IRandomSource
  ) { }

  async execute(
    request: ExecutionRequest,
    directive: Directive,
    context: ExecutionContext
  ): Promise<ExecutionResult> {
    switch (directive.kind) {
      case "fault":
        return this.handleFault(request, directive, context);
      case "terminal":
        context.logger.info("Processing as final hop");
        return this.local(200, SUCCESS_MESSAGE, context);
      case "forward":
        return this.forward(request, directive, context);
    }
  }

  private async handleFault(
    request: ExecutionRequest,
    directive: FaultDirective,
    context: ExecutionContext
  ): Promise<ExecutionResult> {
    const { logger } = context;
    logger.info({ fault_code: directive.statusCode, percentage: directive.percentage }, "Fault injection detected");

    if (this.random.intn(100) < directive.percentage) {
      logger.info({ fault_code: directive.statusCode }, "Fault triggered");
      const message = `Fault injected: ${directive.statusCode} ${reasonPhrase(directive.statusCode)}`;
      return this.local(directive.statusCode, message, context);
    }

    logger.info({ remaining: directive.remainingPath }, "Fault not triggered, continuing to next segment");

    let next: Directive;
    try {
      next = this.interpreter.parse(directive.remainingPath);
    } catch (err) {
      if (!(err instanceof ParseError)) throw err;
      logger.error({ error: err.message, kind: err.kind }, "Failed to parse remaining path");
      return { kind: "error", status: err.statusCode, message: err.message };
    }

    logger.debug(summarizeDirective(next), "Continuing with remaining path");
    return this.execute(request, next, context);
  }

  private async forward(
    request: ExecutionRequest,
    directive: ForwardDirective,
    context: ExecutionContext
  ): Promise<ExecutionResult> {
    const { logger } = context;
    const target = buildTargetUrl(directive);
    logger.info({ next_hop_url: target, next_service: directive.nextHop }, "Forwarding to next hop");

    const startedAt = Date.now();
    try {
      const upstream = await this.proxyClient.forward(target, request, context.signal);
      logger.info(
        { status_code: upstream.statusCode, forward_duration_ms: Date.now() - startedAt, next_hop_url: target },
        "Next hop response received"
      );
      return { kind: "relay", upstream };
    } catch (err) {
      if (!(err instanceof UpstreamError)) throw err;
      logger.error(
        { error: err.message, next_hop_url: target, forward_duration_ms: Date.now() - startedAt },
        "Next hop request failed"
      );
      return { kind: "error", status: err.statusCode, message: `Next hop error: ${err.message}` };
    }
  }

  private local(status: number, message: string, context: ExecutionContext): ExecutionResult {
    return {
      kind: "local",
      status,
      envelope: { status, service: context.serviceName, message },
    };
  }
}
