/**
 * RPC infrastructure exports.
 */

export { Procedure, InvalidParamsError, type ProcedureSchema } from "./procedure.js";
export { ProcedureRegistry, MethodNotFoundError } from "./registry.js";
export { createServiceRegistry } from "./procedures.js";
export { createRpcServer, startRpcServer, TOKEN_HEADER } from "./server.js";
