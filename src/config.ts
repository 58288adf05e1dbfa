import { z } from 'zod';

export type ShareConfig = {
  /**
   * The app is mounted under `/dash` behind the production proxy; share
   * links need that prefix.
   */
  onServer: boolean;
};

/**
 * Environment variables read by the share-link helpers.
 *
 * `ON_SERVER`: any non-empty value counts as "on server".
 */
const shareEnvSchema = z.object({
  ON_SERVER: z
    .string()
    .optional()
    .transform(value => value !== undefined && value !== '')
});

export function loadShareConfig(
  env: Record<string, string | undefined> = process.env
): ShareConfig {
  const { ON_SERVER } = shareEnvSchema.parse(env);
  return { onServer: ON_SERVER };
}
