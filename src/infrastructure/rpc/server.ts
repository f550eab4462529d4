/**
 * Loopback HTTP transport for the report service procedures.
 */

import Fastify, { type FastifyInstance } from "fastify";
import { ReportServiceError, errorMessage } from "../../core/errors.js";
import type { ProcedureRegistry } from "./registry.js";
import { MethodNotFoundError } from "./registry.js";
import { InvalidParamsError } from "./procedure.js";
import logger from "../../utils/logger.js";

export const TOKEN_HEADER = "x-reportd-token";

export interface RpcFailure {
  ok: false;
  error: { code: string; message: string };
}

export interface RpcSuccess {
  ok: true;
  result: unknown;
}

function failure(code: string, message: string): RpcFailure {
  return { ok: false, error: { code, message } };
}

function statusFor(error: unknown): number {
  if (error instanceof InvalidParamsError) return 400;
  if (error instanceof MethodNotFoundError) return 404;
  return 500;
}

/**
 * Build the RPC server. `POST /rpc/:method` runs a procedure; `GET /rpc`
 * lists them.
 */
export function createRpcServer(options: {
  registry: ProcedureRegistry;
  authToken?: string;
}): FastifyInstance {
  const { registry, authToken } = options;
  const app = Fastify({ logger: false, bodyLimit: 64 * 1024 * 1024 });

  app.addHook("onRequest", async (request, reply) => {
    if (!authToken) return;
    if (request.headers[TOKEN_HEADER] !== authToken) {
      logger.warn({ url: request.url }, "Rejected RPC request with invalid token");
      return reply.code(401).send(failure("unauthorized", "Missing or invalid token"));
    }
  });

  app.setErrorHandler((error, _request, reply) => {
    const status = error.statusCode && error.statusCode < 500 ? error.statusCode : 500;
    return reply.code(status).send(failure(status === 500 ? "internal_error" : "bad_request", error.message));
  });

  app.get("/rpc", async (): Promise<RpcSuccess> => {
    return { ok: true, result: registry.getDefinitions() };
  });

  app.post<{ Params: { method: string } }>("/rpc/:method", async (request, reply) => {
    const { method } = request.params;
    const startedAt = Date.now();

    try {
      const result = await registry.execute(method, request.body);
      logger.debug({ method, ms: Date.now() - startedAt }, "RPC call completed");
      const body: RpcSuccess = { ok: true, result: result ?? null };
      return reply.send(body);
    } catch (error) {
      const status = statusFor(error);
      const code = error instanceof ReportServiceError ? error.code : "internal_error";
      if (status === 500) {
        logger.error({ method, error: errorMessage(error) }, "RPC call failed");
      } else {
        logger.warn({ method, code, error: errorMessage(error) }, "RPC call rejected");
      }
      return reply.code(status).send(failure(code, errorMessage(error)));
    }
  });

  return app;
}

/**
 * Listen on the configured loopback address.
 */
export async function startRpcServer(app: FastifyInstance, host: string, port: number): Promise<string> {
  const address = await app.listen({ host, port });
  logger.info({ address }, "RPC server listening");
  return address;
}
