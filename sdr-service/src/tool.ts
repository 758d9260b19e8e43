#!/usr/bin/env node
import { SDR_CMD, buildChildEnv, splitCommand } from './config.js';
import { errorMessage } from './errors.js';
import { sensorLabel } from './identity.js';
import { createLogger } from './logger.js';
import { PacketAssembler, listFamilies, parsePacket } from './packets/index.js';
import { ProcessSupervisor } from './supervisor.js';

const VERSION = '0.1.0';

const args = process.argv.slice(2);

function getArg(flag: string, fallback?: string) {
  const idx = args.indexOf(flag);
  if (idx === -1) return fallback;
  const val = args[idx + 1];
  if (!val || val.startsWith('--')) return fallback;
  return val;
}

function hasFlag(flag: string) {
  return args.includes(flag);
}

function usage(exitCode = 0): never {
  console.log(`sdr-tool [--action <action>] [options]

Actions:
  show-packets     print decoder output and how each packet parsed (default)
  show-detected    print a running count of packets per detected sensor
  list-supported   print the supported packet families

Options:
  --cmd <command>              decoder command line (default: ${SDR_CMD})
  --path <dir>                 prepended to PATH for the decoder
  --ld-library-path <dir>      LD_LIBRARY_PATH for the decoder
  --filter <list>              show-packets output to hide: out,parsed,unparsed,empty
  --debug                      log supervisor diagnostics
  --version                    print the tool version
`);
  process.exit(exitCode);
}

if (hasFlag('--help') || hasFlag('-h')) usage(0);
if (hasFlag('--version')) {
  console.log(`sdr-tool version ${VERSION}`);
  process.exit(0);
}

const action = getArg('--action', 'show-packets');
const log = createLogger('sdr-tool', { debug: hasFlag('--debug') });

function listSupported(): void {
  for (const f of listFamilies()) {
    console.log(`${f.family.padEnd(22)} ${f.identifier}  [${f.models.join(', ')}]`);
  }
}

async function streamPackets(onPacket: (lines: string[]) => void): Promise<void> {
  const { command, args: cmdArgs } = splitCommand(getArg('--cmd', SDR_CMD) ?? SDR_CMD);
  const env = buildChildEnv(process.env, { path: getArg('--path'), ldLibraryPath: getArg('--ld-library-path') });
  const supervisor = new ProcessSupervisor({ logger: log });
  supervisor.on('stderr', (line) => console.log(`err: ${line}`));
  const assembler = new PacketAssembler(onPacket);

  const stop = () => {
    supervisor.stop().catch((e) => log.error(`stop failed: ${errorMessage(e)}`));
  };
  process.on('SIGINT', stop);
  process.on('SIGTERM', stop);

  const stream = supervisor.start(command, cmdArgs, env);
  for await (const line of stream) assembler.push(line);
  assembler.flush();
  if (supervisor.failure) throw supervisor.failure;
}

async function showPackets(): Promise<void> {
  const hidden = (getArg('--filter', 'empty') ?? '').split(',').map((s) => s.trim());
  await streamPackets((lines) => {
    const empty = lines.every((l) => l.trim() === '');
    if (!hidden.includes('out') && (!hidden.includes('empty') || !empty)) {
      console.log(`out: ${JSON.stringify(lines)}`);
    }
    const record = parsePacket(lines);
    if (record) {
      if (!hidden.includes('parsed')) console.log(`parsed: ${JSON.stringify(record)}`);
    } else if (!hidden.includes('unparsed') && (!hidden.includes('empty') || !empty)) {
      console.log(`unparsed: ${JSON.stringify(lines)}`);
    }
  });
}

async function showDetected(): Promise<void> {
  const detected: Record<string, number> = {};
  await streamPackets((lines) => {
    const record = parsePacket(lines);
    if (!record) return;
    const label = sensorLabel(record);
    detected[label] = (detected[label] ?? 0) + 1;
    console.log(JSON.stringify(detected));
  });
}

async function main() {
  switch (action) {
    case 'list-supported':
      listSupported();
      return;
    case 'show-detected':
      await showDetected();
      return;
    case 'show-packets':
      await showPackets();
      return;
    default:
      console.error(`unknown action '${action}'`);
      usage(2);
  }
}

main().catch((e) => {
  console.error(`sdr-tool: ${errorMessage(e)}`);
  process.exitCode = 1;
});
