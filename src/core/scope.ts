/**
 * Scoped environment lifetime — the environment is closed on every exit path
 * of the callback, whether it returns or throws.
 */
import { EpisodeEnvironment } from "./environment.js";
import type { EpisodeEnvironmentOptions } from "./environment.js";

export async function withEnvironment<T>(
    options: EpisodeEnvironmentOptions,
    fn: (env: EpisodeEnvironment) => Promise<T> | T,
): Promise<T> {
    const env = await EpisodeEnvironment.create(options);
    try {
        return await fn(env);
    } finally {
        await env.close();
    }
}
