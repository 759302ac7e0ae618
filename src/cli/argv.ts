export interface ParsedArgv {
  readonly command: string;
  /** Option names in camelCase; a flag without a value is `true`. */
  readonly options: Record<string, string | boolean>;
  /** Tokens that are neither the command nor an option. */
  readonly extra: readonly string[];
}

function camelCase(name: string): string {
  return name.replace(/-([a-z0-9])/g, (_, letter: string) => letter.toUpperCase());
}

/**
 * `<command> [--flag] [--name value] [--name=value]`
 */
export function parseArgv(args: readonly string[]): ParsedArgv {
  const command = args[0] ?? 'help';
  const options: Record<string, string | boolean> = {};
  const extra: string[] = [];

  for (let i = 1; i < args.length; i++) {
    const arg = args[i];
    if (!arg.startsWith('--')) {
      extra.push(arg);
      continue;
    }
    const body = arg.slice(2);
    const equals = body.indexOf('=');
    if (equals >= 0) {
      options[camelCase(body.slice(0, equals))] = body.slice(equals + 1);
      continue;
    }
    const next = args[i + 1];
    if (next !== undefined && !next.startsWith('--')) {
      options[camelCase(body)] = next;
      i++;
    } else {
      options[camelCase(body)] = true;
    }
  }

  return { command, options, extra };
}
