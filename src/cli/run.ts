/*
 * The command: parse flags, sample until convergence, print the report.
 */

import { parse_args, usage } from 'cli/config.ts'
import { catalog } from 'lib/categories.ts'
import { Deck } from 'lib/deck.ts'
import { progress_line, report_lines } from 'lib/report.ts'
import { Simulator } from 'lib/simulator.ts'
import { default_rng, seeded_rng } from 'utils/random.ts'
import { isErr } from 'utils/result.ts'
import { plural } from 'utils/string.ts'

import log from 'utils/logger.ts'

/*
 * Where the command writes its lines: `out` carries the report, `err` the
 * error line.
 */
export type Output = {
  out: (line: string) => void;
  err: (line: string) => void;
};

export const console_output: Output = {
  out: line => console.log(line),
  err: line => console.error(line),
};

/*
 * Run the command on `argv` (without the node and script paths) and return
 * its exit status.
 */
export function main(
  argv: readonly string[],
  output: Output = console_output,
): number {
  const parsed = parse_args(argv);
  if (isErr(parsed)) {
    log.error('invalid configuration', {reason: parsed.err.msg});
    output.err(`error: ${parsed.err.msg}`);
    return 1;
  }

  const invocation = parsed.ok;
  if (invocation.kind === 'help') {
    output.out(usage);
    return 0;
  }
  const {config} = invocation;

  const deck = new Deck(config.decks, config.jokers);
  const categories = catalog(config.hand_size);
  const sim = new Simulator(deck, categories, {
    cards: config.cards,
    batch_size: config.batch_size,
    max_iterations: config.max_iterations,
    rng: config.seed === null ? default_rng() : seeded_rng(config.seed),
  });

  log.info(
    `sampling ${config.cards} card${plural(config.cards)} from ` +
    `${deck.size} (${config.decks} deck${plural(config.decks)}, ` +
    `${config.jokers} joker${plural(config.jokers)})`,
    {...config, categories: categories.length},
  );
  const start = Date.now();

  const summary = sim.run(iterations => output.out(progress_line(iterations)));

  log.info('simulation complete', {
    iterations: summary.iterations,
    converged: summary.converged,
    elapsed_ms: Date.now() - start,
  });

  for (const line of report_lines(summary)) output.out(line);
  return 0;
}
