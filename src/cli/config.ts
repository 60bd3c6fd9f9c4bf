/*
 * Command-line configuration.
 *
 * Flags are tokenized by node and then decoded into a typed Config, so every
 * bound lives in one place and every rejection reads the same way.
 */

import { parseArgs } from 'util'

import { pipe } from 'fp-ts/function'
import { fold } from 'fp-ts/Either'
import * as D from 'io-ts/Decoder'

import { HandSize, is_hand_size } from 'lib/categories.ts'
import { Ok, Err } from 'utils/result.ts'
import type { Result } from 'utils/result.ts'

import * as options from 'options.ts'

export type Config = {
  cards: number;
  decks: number;
  jokers: number;
  hand_size: HandSize;
  seed: number | null;
  batch_size: number;
  max_iterations: number | null;
};

export type Invocation =
  | {kind: 'help'}
  | {kind: 'run', config: Config}
  ;

export class ConfigError {
  constructor(readonly msg: string) {}
  toString(): string { return `ConfigError: ${this.msg}`; }
}

export const usage = `\
usage: wildodds [options]

  --cards <n>           items drawn per hand, at most ${options.max_cards} \
(default ${options.default_cards})
  --decks <n>           standard 52-card decks, at most ${options.max_decks} \
(default ${options.default_decks})
  --jokers <n>          jokers added to the deck, at most ${options.max_jokers} \
(default ${options.default_jokers})
  --hand-size <5|6>     extra hand categories to tally \
(default ${options.default_hand_size})
  --seed <n>            seed the random source, in [0, ${options.max_seed}]
  --batch-size <n>      hands between convergence checks \
(default ${options.batch_size})
  --max-iterations <n>  stop after this many hands, converged or not
  --help                print this message`;

///////////////////////////////////////////////////////////////////////////////
/*
 * Flag decoders.
 */

const Integer: D.Decoder<unknown, number> = pipe(
  D.string,
  D.parse((s: string) =>
    /^[+-]?\d+$/.test(s) && Number.isSafeInteger(Number(s))
      ? D.success(Number(s))
      : D.failure(s, 'an integer')
  ),
);

const between = (lo: number, hi: number) => pipe(
  Integer,
  D.refine(
    (n: number): n is number => n >= lo && n <= hi,
    `an integer in [${lo}, ${hi}]`
  ),
);

const at_least = (lo: number) => pipe(
  Integer,
  D.refine((n: number): n is number => n >= lo, `an integer >= ${lo}`),
);

const Flags = D.partial({
  'cards': between(1, options.max_cards),
  'decks': between(0, options.max_decks),
  'jokers': between(0, options.max_jokers),
  'hand-size': pipe(Integer, D.refine(is_hand_size, '5 or 6')),
  'seed': between(0, options.max_seed),
  'batch-size': at_least(1),
  'max-iterations': at_least(1),
});

const string_flag = {type: 'string'} as const;

/*
 * Collapse a drawn decode error tree into one line, e.g.
 *
 *   optional property "cards": cannot decode 13, should be ...
 *
 * with separate failures joined by '; '.
 */
function flatten(drawn: string): string {
  const failures: string[] = [];
  for (const line of drawn.split('\n')) {
    const text = line.replace(/^[\s│├└─]+/, '');
    if (text === line || failures.length === 0) {
      failures.push(text);
    } else {
      failures[failures.length - 1] += `: ${text}`;
    }
  }
  return failures.join('; ');
}

///////////////////////////////////////////////////////////////////////////////

/*
 * Parse `argv` (without the node and script paths).
 */
export function parse_args(
  argv: readonly string[],
): Result<Invocation, ConfigError> {
  let values: Record<string, unknown>;
  try {
    ({values} = parseArgs({
      args: [...argv],
      strict: true,
      allowPositionals: false,
      options: {
        'cards': string_flag,
        'decks': string_flag,
        'jokers': string_flag,
        'hand-size': string_flag,
        'seed': string_flag,
        'batch-size': string_flag,
        'max-iterations': string_flag,
        'help': {type: 'boolean'},
      },
    }));
  } catch (err) {
    if (err instanceof Error) return Err(new ConfigError(err.message));
    throw err;
  }

  if (values['help'] === true) return Ok<Invocation>({kind: 'help'});

  return pipe(
    Flags.decode(values),
    fold(
      (e): Result<Invocation, ConfigError> =>
        Err(new ConfigError(flatten(D.draw(e)))),
      (flags) => validate({
        cards: flags['cards'] ?? options.default_cards,
        decks: flags['decks'] ?? options.default_decks,
        jokers: flags['jokers'] ?? options.default_jokers,
        hand_size: flags['hand-size'] ?? options.default_hand_size,
        seed: flags['seed'] ?? null,
        batch_size: flags['batch-size'] ?? options.batch_size,
        max_iterations: flags['max-iterations'] ?? null,
      }),
    ),
  );
}

/*
 * Cross-flag checks.
 */
function validate(config: Config): Result<Invocation, ConfigError> {
  const deck_size = config.decks * 52 + config.jokers;
  if (deck_size < config.cards) {
    return Err(new ConfigError(
      `cannot draw ${config.cards} cards from a deck of ${deck_size}`
    ));
  }
  return Ok<Invocation>({kind: 'run', config});
}
