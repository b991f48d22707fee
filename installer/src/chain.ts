import { errorMessage } from "./errors.js";
import type { Logger } from "./log.js";

export type Attempt<T> =
  | { ok: true; value: T }
  | { ok: false; reason: string };

export interface Provider<T> {
  name: string;
  attempt(): Attempt<T> | Promise<Attempt<T>>;
}

export interface ChainWinner<T> {
  provider: string;
  value: T;
}

export const success = <T>(value: T): Attempt<T> => ({ ok: true, value });
export const skip = <T = never>(reason: string): Attempt<T> => ({ ok: false, reason });

/**
 * Tries providers strictly in order and returns the first success. Skips and
 * thrown errors are transient: logged at debug level, then the next provider runs.
 */
export async function firstSuccess<T>(
  providers: ReadonlyArray<Provider<T>>,
  log?: Logger
): Promise<ChainWinner<T> | null> {
  for (const provider of providers) {
    let result: Attempt<T>;
    try {
      result = await provider.attempt();
    } catch (err) {
      result = skip(errorMessage(err));
    }
    if (result.ok) {
      return { provider: provider.name, value: result.value };
    }
    log?.debug(`${provider.name}: ${result.reason}`);
  }
  return null;
}

/** Outcome of a best-effort side effect; logged by the caller, never thrown. */
export type StepResult = { ok: true } | { ok: false; reason: string };
