import { parse_args, ConfigError } from 'cli/config.ts'
import type { Config } from 'cli/config.ts'
import { HandSize } from 'lib/categories.ts'
import { assertOk, assertErr } from 'utils/result.ts'

import * as options from 'options.ts'

import {expect} from 'chai'

const run_config = (argv: string[]): Config => {
  const invocation = assertOk(parse_args(argv));
  if (invocation.kind !== 'run') throw new Error('expected a run');
  return invocation.config;
};

describe('parse_args', () => {
  it('fills in defaults', () => {
    expect(run_config([])).to.deep.equal({
      cards: 7,
      decks: 1,
      jokers: 0,
      hand_size: HandSize.FIVE,
      seed: null,
      batch_size: 100000,
      max_iterations: null,
    });
  });

  it('reads every flag', () => {
    expect(run_config([
      '--cards=5', '--jokers', '2', '--decks', '2', '--hand-size', '6',
      '--seed', '42', '--batch-size', '1000', '--max-iterations', '5000',
    ])).to.deep.equal({
      cards: 5,
      decks: 2,
      jokers: 2,
      hand_size: HandSize.SIX,
      seed: 42,
      batch_size: 1000,
      max_iterations: 5000,
    });
  });

  it('asks for help', () => {
    expect(assertOk(parse_args(['--help']))).to.deep.equal({kind: 'help'});
  });

  it('rejects more than twelve cards', () => {
    const err = assertErr(parse_args(['--cards', '13']));
    expect(err).to.be.an.instanceof(ConfigError);
    expect(err.msg).to.include('an integer in [1, 12]');
    expect(run_config(['--cards', '12']).cards).to.equal(12);
  });

  it('rejects unsupported hand sizes', () => {
    expect(assertErr(parse_args(['--hand-size', '7'])).msg).to.include('5 or 6');
  });

  it('rejects non-integers', () => {
    expect(assertErr(parse_args(['--decks', 'two'])).msg)
      .to.include('an integer');
    expect(assertErr(parse_args(['--jokers', '1.5'])).msg)
      .to.include('an integer');
  });

  it('rejects integers too large to hold exactly', () => {
    const err = assertErr(parse_args(['--decks', '99999999999999999999']));
    expect(err.msg).to.include('"99999999999999999999"');
    expect(err.msg).to.include('should be an integer');
  });

  it('bounds the deck flags', () => {
    expect(assertErr(parse_args(['--decks', '1001'])).msg)
      .to.include('an integer in [0, 1000]');
    expect(assertErr(parse_args(['--jokers', '1001'])).msg)
      .to.include('an integer in [0, 1000]');
    expect(run_config(['--decks', '1000', '--jokers', '1000']))
      .to.include({decks: 1000, jokers: 1000});
  });

  it('keeps seeds within 32 bits', () => {
    expect(assertErr(parse_args(['--seed', '4294967296'])).msg)
      .to.include('an integer in [0, 4294967295]');
    expect(assertErr(parse_args(['--seed=-1'])).msg)
      .to.include('an integer in [0, 4294967295]');
    expect(run_config(['--seed', '4294967295']).seed).to.equal(4294967295);
    expect(run_config(['--seed', '0']).seed).to.equal(0);
  });

  it('reports decode failures on one line', () => {
    const {msg} = assertErr(parse_args(['--cards', '13']));
    expect(msg).to.not.include('\n');
    expect(msg.startsWith('optional property "cards": ')).to.be.true;
    expect(msg.endsWith('should be an integer in [1, 12]')).to.be.true;

    const both = assertErr(parse_args(['--cards', '0', '--jokers', 'x'])).msg;
    expect(both).to.not.include('\n');
    expect(both).to.include('"cards"');
    expect(both).to.include('"jokers"');
  });

  it('defaults the hand size from the options', () => {
    expect(run_config([]).hand_size).to.equal(options.default_hand_size);
  });

  it('rejects unknown flags and positionals', () => {
    expect(assertErr(parse_args(['--bogus'])).msg).to.include('--bogus');
    expect(assertErr(parse_args(['extra'])).msg).to.include('extra');
  });

  it('rejects decks too small for the hand', () => {
    expect(assertErr(parse_args(['--decks', '0', '--cards', '5'])).msg)
      .to.equal('cannot draw 5 cards from a deck of 0');
    expect(run_config(['--decks', '0', '--jokers', '5', '--cards', '5']).jokers)
      .to.equal(5);
  });

  it('stringifies errors', () => {
    expect(new ConfigError('bad').toString()).to.equal('ConfigError: bad');
  });
});
