import { parseArgs } from '../scripts/telemetryCli';

describe('parseArgs', () => {
  it('separates positionals, valued flags and switches', () => {
    const args = parseArgs([
      'tank',
      '--segments',
      '1T-write:30',
      '--interval=2',
      '--no-arc',
      '--out',
      './runs',
    ]);
    expect(args.positional).toEqual(['tank']);
    expect(args.flags.get('segments')).toBe('1T-write:30');
    expect(args.flags.get('interval')).toBe('2');
    expect(args.flags.get('no-arc')).toBe(true);
    expect(args.flags.get('out')).toBe('./runs');
  });

  it('never lets a switch swallow the next positional', () => {
    const args = parseArgs(['--no-arc', 'tank']);
    expect(args.positional).toEqual(['tank']);
    expect(args.flags.get('no-arc')).toBe(true);
  });

  it('marks a trailing flag without a value', () => {
    expect(parseArgs(['--scaling']).flags.get('scaling')).toBe(true);
  });
});
