/**
 * Switchboard CLI - Option Letter Parsing
 *
 * `optstring` lists the accepted letters; a letter followed by `:` takes an
 * argument, attached (`-fNAME`) or as the next word. Parsing stops at `--`,
 * at a lone `-` and at the first word that does not start with `-`.
 */

export type GetoptResult =
  | {
      readonly ok: true;
      readonly flags: ReadonlyMap<string, string | true>;
      readonly operands: ReadonlyArray<string>;
    }
  | { readonly ok: false; readonly option: string; readonly missingArgument: boolean };

function takesArgument(optstring: string, letter: string): boolean | undefined {
  const at = optstring.indexOf(letter);
  if (at === -1 || letter === ':') return undefined;
  return optstring[at + 1] === ':';
}

export function getopt(args: ReadonlyArray<string>, optstring: string): GetoptResult {
  const flags = new Map<string, string | true>();
  let index = 0;

  while (index < args.length) {
    const word = args[index] ?? '';
    if (word === '--') {
      index++;
      break;
    }
    if (!word.startsWith('-') || word === '-') break;
    index++;

    for (let at = 1; at < word.length; at++) {
      const letter = word.charAt(at);
      const needsArgument = takesArgument(optstring, letter);
      if (needsArgument === undefined) {
        return { ok: false, option: letter, missingArgument: false };
      }
      if (!needsArgument) {
        flags.set(letter, true);
        continue;
      }
      const attached = word.slice(at + 1);
      if (attached !== '') {
        flags.set(letter, attached);
      } else {
        const next = args[index];
        if (next === undefined) return { ok: false, option: letter, missingArgument: true };
        flags.set(letter, next);
        index++;
      }
      break;
    }
  }

  return { ok: true, flags, operands: args.slice(index) };
}

export function getoptDiagnostic(
  command: string,
  failure: { readonly option: string; readonly missingArgument: boolean },
): string {
  return failure.missingArgument
    ? `${command}: -${failure.option}: option requires an argument`
    : `${command}: -${failure.option}: invalid option`;
}
