import {
  BackendError,
  DuplicateModelError,
  ResultSchema,
  UnknownModelError,
  withDeadline,
  type Result,
} from "@promptline/core";

// ─── Backend capability ────────────────────────────────────────────────────────

export interface GenerateOptions {
  signal: AbortSignal;
  temperature?: number;
  maxTokens?: number;
}

/** What a backend's generation call may hand back. */
export type BackendReply = string | { text: string; raw?: unknown } | Error;

export type GenerateFn = (
  prompt: string,
  options: GenerateOptions
) => BackendReply | Promise<BackendReply>;

/** A backend exposing `entryPoint` as its generation call. */
export type Backend<K extends string> = { [P in K]: GenerateFn };

export interface AdapterBinding {
  readonly modelId: string;
  readonly entryPoint: string;
  readonly call: GenerateFn;
}

export interface InvokeOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
  temperature?: number;
  maxTokens?: number;
}

// ─── Adapter Registry ──────────────────────────────────────────────────────────
// The one place that knows each backend's native method name. Callers only see
// invoke(modelId, prompt).

export class AdapterRegistry {
  private bindings = new Map<string, AdapterBinding>();

  // K comes from entryPoint alone; B is then checked against it.
  register<K extends string, B extends Backend<K>>(
    modelId: string,
    backend: B,
    entryPoint: K
  ): AdapterBinding {
    if (this.bindings.has(modelId)) {
      throw new DuplicateModelError(modelId);
    }

    // Untyped hosts can still hand over an object without the method.
    const target: Backend<K> = backend;
    const method: unknown = target[entryPoint];
    if (typeof method !== "function") {
      throw new TypeError(`Backend for ${modelId} has no callable "${entryPoint}"`);
    }

    const binding: AdapterBinding = Object.freeze({
      modelId,
      entryPoint,
      call: target[entryPoint].bind(target),
    });
    this.bindings.set(modelId, binding);
    return binding;
  }

  unregister(modelId: string): boolean {
    return this.bindings.delete(modelId);
  }

  has(modelId: string): boolean {
    return this.bindings.has(modelId);
  }

  list(): string[] {
    return Array.from(this.bindings.keys());
  }

  async invoke(modelId: string, prompt: string, options: InvokeOptions = {}): Promise<Result> {
    const binding = this.bindings.get(modelId);
    if (!binding) {
      throw new UnknownModelError(modelId);
    }

    const reply = await withDeadline(
      async (signal) => {
        try {
          return await binding.call(prompt, {
            signal,
            temperature: options.temperature,
            maxTokens: options.maxTokens,
          });
        } catch (err) {
          throw new BackendError(modelId, err);
        }
      },
      { signal: options.signal, timeoutMs: options.timeoutMs, label: `invoke(${modelId})` }
    );

    if (reply instanceof Error) {
      throw new BackendError(modelId, reply);
    }
    if (typeof reply === "string") {
      return { text: reply, raw: reply };
    }

    // Untyped hosts can return anything; only {text: string, raw?} is a reply.
    const parsed = ResultSchema.safeParse(reply);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) =>
        i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message
      );
      throw new BackendError(modelId, new TypeError(`invalid reply: ${issues.join("; ")}`));
    }
    return { text: parsed.data.text, raw: parsed.data.raw !== undefined ? parsed.data.raw : reply };
  }
}
