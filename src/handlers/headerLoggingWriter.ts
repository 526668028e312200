import type { ServerResponse } from "node:http";
import type { Logger } from "pino";
import type { IResponseWriter } from "../core/interfaces";
import type { ExecutionResult } from "../core/models";

/** Logs the headers this node actually sent, once the response is written. */
export class HeaderLoggingWriter implements IResponseWriter {
  constructor(private inner: IResponseWriter) { }

  async write(res: ServerResponse, result: ExecutionResult, logger: Logger): Promise<void> {
    await this.inner.write(res, result, logger);
    logger.info({ response_headers: res.getHeaders() }, "Response headers");
  }
}
