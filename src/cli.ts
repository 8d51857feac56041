import { Command, CommanderError } from 'commander';
import pc from 'picocolors';

import {
  DEFAULT_OUTPUT_DIR,
  DEFAULT_REGISTRY,
  loadNotesConfig,
  resolveNotesConfig,
  type NotesConfig
} from './config/notes-config.js';
import type { Diagnostic } from './core/diagnostics.js';
import { generateVersionNotes, type GenerateOptions } from './public/api.js';

/** Output streams, replaceable in tests. */
export interface CliIo {
  out: (line: string) => void;
  err: (line: string) => void;
}

/** Raw flag values as commander hands them over. */
interface CliFlags {
  registry?: string;
  output?: string;
  config?: string;
}

const defaultIo: CliIo = {
  out: (line) => process.stdout.write(`${line}\n`),
  err: (line) => process.stderr.write(`${line}\n`)
};

/** Render one diagnostic as a console line. */
export function formatDiagnostic(diagnostic: Diagnostic): string {
  const location = diagnostic.xmlPath ? pc.gray(` (${diagnostic.xmlPath})`) : '';
  switch (diagnostic.severity) {
    case 'error':
      return `${pc.red('ERROR:')} ${diagnostic.message}${location}`;
    case 'warning':
      return `${pc.yellow('WARNING:')} ${diagnostic.message}${location}`;
    case 'info':
      return diagnostic.message;
  }
}

/** Build the `version-notes` command. `generate` is injectable for tests. */
export function createProgram(
  io: CliIo = defaultIo,
  generate: typeof generateVersionNotes = generateVersionNotes
): Command {
  return new Command('version-notes')
    .description('Generate per-symbol version notes from an API registry')
    .option('-r, --registry <location>', `registry file or http(s) URL (default: ${DEFAULT_REGISTRY})`)
    .option('-o, --output <dir>', `directory to write notes into (default: ${DEFAULT_OUTPUT_DIR})`)
    .option('-c, --config <file>', 'YAML file providing registry and output')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.out(text.trimEnd()),
      writeErr: (text) => io.err(text.trimEnd())
    })
    .action(async (flags: CliFlags) => {
      const fileConfig: NotesConfig = flags.config ? await loadNotesConfig(flags.config) : {};
      const config = resolveNotesConfig({ registry: flags.registry, output: flags.output }, fileConfig);

      io.out(`Generating version notes from: ${config.registry}`);

      const options: GenerateOptions = {
        registry: config.registry,
        outputDir: config.output,
        onDiagnostic: (diagnostic) => {
          const line = formatDiagnostic(diagnostic);
          if (diagnostic.severity === 'info') {
            io.out(line);
          } else {
            io.err(line);
          }
        }
      };

      await generate(options);
    });
}

/** Parse `argv`, run the generator and return the process exit code. */
export async function runCli(argv: readonly string[], io: CliIo = defaultIo): Promise<number> {
  const program = createProgram(io);
  try {
    await program.parseAsync([...argv]);
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    io.err(`${pc.red('ERROR:')} ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }
}
