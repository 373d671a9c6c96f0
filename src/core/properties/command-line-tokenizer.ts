import { ConfigurationError } from '../errors.js';

type Quote = '"' | "'";

function isQuote(c: string): c is Quote {
  return c === '"' || c === "'";
}

/**
 * Split a command line into arguments the way a POSIX shell would for simple
 * input: whitespace separates arguments, single or double quotes group, and a
 * backslash-escaped quote inside a quoted segment is kept literally.
 *
 * @example
 * tokenizeCommandLine(`node "my app.js" --name='a b'`)
 * // ['node', 'my app.js', '--name=a b']
 */
export function tokenizeCommandLine(commandLine: string | undefined): string[] {
  const args: string[] = [];
  if (!commandLine) {
    return args;
  }

  let current = '';
  let inArg = false;
  let quote: Quote | undefined;

  for (let i = 0; i < commandLine.length; i++) {
    const c = commandLine.charAt(i);

    if (quote) {
      if (c === '\\' && commandLine.charAt(i + 1) === quote) {
        current += quote;
        i++;
      } else if (c === quote) {
        quote = undefined;
      } else {
        current += c;
      }
      continue;
    }

    if (isQuote(c)) {
      quote = c;
      inArg = true;
    } else if (/\s/.test(c)) {
      if (inArg) {
        args.push(current);
        current = '';
        inArg = false;
      }
    } else {
      current += c;
      inArg = true;
    }
  }

  if (quote) {
    throw new ConfigurationError(
      `Unbalanced quotes in command line: '${commandLine}'`,
      undefined,
      commandLine
    );
  }

  if (inArg) {
    args.push(current);
  }

  return args;
}
