/**
 * Procedure registry for the RPC transport.
 */

import type { Procedure, ProcedureSchema } from "./procedure.js";
import { ReportServiceError } from "../../core/errors.js";

/**
 * Requested method is not registered.
 */
export class MethodNotFoundError extends ReportServiceError {
  constructor(method: string) {
    super("method_not_found", `Unknown method '${method}'`);
  }
}

/**
 * Registry for remote procedures.
 */
export class ProcedureRegistry {
  private procedures: Map<string, Procedure> = new Map();

  /**
   * Register a procedure.
   */
  register(procedure: Procedure): void {
    this.procedures.set(procedure.name, procedure);
  }

  /**
   * Get a procedure by name.
   */
  get(name: string): Procedure | undefined {
    return this.procedures.get(name);
  }

  has(name: string): boolean {
    return this.procedures.has(name);
  }

  /**
   * Descriptions of every registered procedure.
   */
  getDefinitions(): ProcedureSchema[] {
    return Array.from(this.procedures.values()).map((p) => p.toSchema());
  }

  /**
   * Validate and run a procedure by name.
   */
  async execute(name: string, params: unknown): Promise<unknown> {
    const procedure = this.procedures.get(name);
    if (!procedure) {
      throw new MethodNotFoundError(name);
    }
    return procedure.invoke(params);
  }

  /**
   * Get list of registered procedure names.
   */
  get methodNames(): string[] {
    return Array.from(this.procedures.keys());
  }

  get size(): number {
    return this.procedures.size;
  }
}
