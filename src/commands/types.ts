import type { CommandModule } from 'yargs';

/**
 * Type-safe command module definition for the CLI.
 * Each file under commands/ default-exports one of these.
 */
export type Command<T = object> = CommandModule<object, T>;
