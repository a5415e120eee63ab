import { z } from 'zod';

export const ConversionOptions = z.object({
  header: z.boolean(),
  // Characters tag tokens never contain.
  tagSeparator: z
    .string()
    .regex(
      /^[\s,;]+$/,
      'Tag separator must be whitespace, commas or semicolons',
    ),
});

export type ConversionOptions = z.infer<typeof ConversionOptions>;

export const DEFAULT_CONVERSION_OPTIONS: ConversionOptions = {
  header: true,
  tagSeparator: ' ',
};

/**
 * Defaults stored in the config file. Every key is optional; unknown keys
 * are ignored.
 */
export const PersistentConfig = ConversionOptions.partial();

export type PersistentConfig = z.infer<typeof PersistentConfig>;

export const CONFIG_KEYS = ['header', 'tagSeparator'] as const;
export type ConfigKey = (typeof CONFIG_KEYS)[number];

/**
 * Converts a value typed on the command line (`config set header false`)
 * into the type stored in the config file.
 */
export function parseConfigValue(
  key: ConfigKey,
  raw: string,
): boolean | string {
  const result =
    key === 'header'
      ? z.stringbool().safeParse(raw)
      : ConversionOptions.shape.tagSeparator.safeParse(raw);
  if (!result.success) {
    throw new Error(
      `Invalid value for "${key}":\n${z.prettifyError(result.error)}`,
    );
  }
  return result.data;
}

/**
 * Resolves the options for one conversion run. Values given on the command
 * line win over the config file, which wins over the built-in defaults.
 */
export function parseConversionOptions(
  cliArgs: { header?: boolean; tagSeparator?: string },
  persisted: PersistentConfig = {},
): ConversionOptions {
  const result = ConversionOptions.safeParse({
    header:
      cliArgs.header ?? persisted.header ?? DEFAULT_CONVERSION_OPTIONS.header,
    tagSeparator:
      cliArgs.tagSeparator ??
      persisted.tagSeparator ??
      DEFAULT_CONVERSION_OPTIONS.tagSeparator,
  });

  if (!result.success) {
    throw new Error(
      `Invalid configuration:\n${z.prettifyError(result.error)}`,
    );
  }

  return result.data;
}
