#!/usr/bin/env node
/*
 Command line entry for recording and re-analyzing telemetry runs.
 Usage: ts-node ./src/scripts/telemetryCli.ts <command> [options]
 Commands: record, analyze, help
*/
import { CustomError, ValidationError, errorMessage } from '../errors/CustomError';
import { analyzeRecording, parseSegmentSchedule, recordRun } from './recordRun';

type Command = 'record' | 'analyze' | 'help';

const COMMANDS: readonly Command[] = ['record', 'analyze', 'help'];

const isCommand = (v: string): v is Command => COMMANDS.some(c => c === v);

const DEFAULT_SEGMENTS = '1T-write:30,1T-read:30';

// flags that never take a value
const SWITCHES: ReadonlySet<string> = new Set(['no-arc']);

export interface ParsedArgs {
  positional: string[];
  flags: Map<string, string | true>;
}

/** --key value, --key=value and bare --switch; everything else is positional. */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const positional: string[] = [];
  const flags = new Map<string, string | true>();
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg.startsWith('--')) {
      positional.push(arg);
      continue;
    }
    const eq = arg.indexOf('=');
    if (eq > 0) {
      flags.set(arg.slice(2, eq), arg.slice(eq + 1));
    } else if (SWITCHES.has(arg.slice(2))) {
      flags.set(arg.slice(2), true);
    } else if (i + 1 < argv.length && !argv[i + 1].startsWith('--')) {
      flags.set(arg.slice(2), argv[++i]);
    } else {
      flags.set(arg.slice(2), true);
    }
  }
  return { positional, flags };
}

function stringFlag(args: ParsedArgs, name: string): string | undefined {
  const v = args.flags.get(name);
  if (v === true) throw new ValidationError(`--${name} needs a value`);
  return v;
}

function intFlag(args: ParsedArgs, name: string): number | undefined {
  const raw = stringFlag(args, name);
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 0) {
    throw new ValidationError(`--${name} must be a non-negative integer (got "${raw}")`);
  }
  return n;
}

function printHelp() {
  const commands: Array<[string, string]> = [
    [
      'record <pool>',
      `sample zpool iostat + arcstat over a segment schedule (default ${DEFAULT_SEGMENTS})`,
    ],
    ['  --segments', 'comma separated <label>:<seconds> list'],
    ['  --interval', 'sampling interval in seconds'],
    ['  --warmup / --cooldown', 'samples captured before / after the schedule'],
    ['  --out', 'output directory (a timestamped folder is created inside)'],
    ['  --no-arc', 'skip the arcstat collector'],
    ['analyze <dir>', 'recompute analytics.json from a recording folder'],
    ['  --scaling', 'JSON file with [{threads, avgWriteSpeed, avgReadSpeed}]'],
  ];
  console.log('Telemetry commands:');
  for (const [k, v] of commands) console.log(` - ${k}: ${v}`);
}

async function main() {
  const raw = (process.argv[2] || '').toLowerCase();
  if (!raw || raw === '--help' || raw === '-h') {
    printHelp();
    return;
  }
  if (!isCommand(raw)) {
    console.error(`Unknown command: ${raw}`);
    printHelp();
    process.exitCode = 1;
    return;
  }
  const args = parseArgs(process.argv.slice(3));

  switch (raw) {
    case 'record': {
      const poolName = args.positional[0];
      if (!poolName) throw new ValidationError('record needs a pool name');
      const { outDir, pool, arc } = await recordRun({
        poolName,
        segments: parseSegmentSchedule(stringFlag(args, 'segments') ?? DEFAULT_SEGMENTS),
        intervalSec: intFlag(args, 'interval'),
        warmup: intFlag(args, 'warmup'),
        cooldown: intFlag(args, 'cooldown'),
        outDir: stringFlag(args, 'out'),
        arc: !args.flags.has('no-arc'),
      });
      console.log(
        `[telemetry] Done: ${pool.samples.length} pool samples` +
          (arc ? `, ${arc.samples.length} ARC samples` : '') +
          ` -> ${outDir}`,
      );
      break;
    }
    case 'analyze': {
      const dir = args.positional[0];
      if (!dir) throw new ValidationError('analyze needs a recording directory');
      const analytics = await analyzeRecording(dir, stringFlag(args, 'scaling'));
      const { sampleCounts, anomalies } = analytics.pool;
      console.log(
        `[telemetry] ${sampleCounts.total} samples, ${sampleCounts.steadyState} steady-state, ` +
          `${anomalies.length} anomalies`,
      );
      break;
    }
    case 'help':
      printHelp();
      break;
  }
}

if (require.main === module) {
  main().catch(err => {
    const code = err instanceof CustomError ? ` (${err.code})` : '';
    console.error(`[telemetry] Error${code}:`, errorMessage(err));
    if (err instanceof CustomError && err.details) {
      for (const d of err.details) console.error(`  - ${d.field}: ${d.message}`);
    }
    process.exit(1);
  });
}
