import { LoomError, ERR } from "../core/errors.js";
import type { StepMethod } from "./step.js";

/** Name <-> method table used to persist steps without function references. */
export class MethodRegistry {
  private methods = new Map<string, StepMethod>();
  private names = new Map<StepMethod, string>();

  register(name: string, method: StepMethod): void {
    const previous = this.methods.get(name);
    if (previous) this.names.delete(previous);
    this.methods.set(name, method);
    this.names.set(method, name);
  }

  require(name: string): StepMethod {
    const method = this.methods.get(name);
    if (!method) throw new LoomError(ERR.UNKNOWN_METHOD, `no method registered as '${name}'`, { name });
    return method;
  }

  nameOf(method: StepMethod): string | undefined {
    return this.names.get(method);
  }
}
