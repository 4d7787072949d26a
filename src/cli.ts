/**
 * Command-line surface
 *
 * Every command prints one JSON envelope on stdout:
 *   { "success": true, "data": ... }
 *   { "success": false, "error": { "category", "message", "details" } }
 * Logs go to stderr.
 *
 * @module cli
 */

import { parseArgs } from 'node:util';

import { createApp, type App, type AppOptions } from './app.js';
import { PipelineError, errorMessage } from './services/pipeline/errors.js';
import { DatabaseError } from './services/storage/database/types.js';
import { MigrationError } from './services/storage/migrations/types.js';
import type { TextExtractionStatus } from './models/document.js';

export const USAGE = `Usage: docextract <command> [options]

Commands:
  ingest <file> --type <documentType> [--mime <type>]   Register an upload
  run <documentId> [--timeout <ms>]                     Run the pipeline for one document
  run-pending                                           Run every ready document
  status <documentId>                                   Show status and artifacts
  list [--status <textStatus>]                          List documents
  sweep                                                 Reclaim jobs abandoned mid-run
  stats                                                 Document and job counts
  types                                                 List configured document types

Options:
  --data-path <dir>   Data directory (default: DOCEXTRACT_DATA_PATH or ~/.docextract)
  -h, --help          Show this help`;

export interface CliOutput {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
}

const defaultOutput: CliOutput = {
  stdout: (line) => process.stdout.write(`${line}\n`),
  stderr: (line) => process.stderr.write(`${line}\n`),
};

export type AppFactory = (options: AppOptions) => App;

const TEXT_STATUSES: readonly TextExtractionStatus[] = ['not_ready', 'ready', 'in_progress', 'completed', 'failed'];

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// RESPONSE FORMATTING
// ═══════════════════════════════════════════════════════════════════════════════

export function formatSuccess(data: unknown): string {
  return JSON.stringify({ success: true, data }, null, 2);
}

export function formatError(error: unknown): string {
  let category = 'INTERNAL_ERROR';
  let details: Record<string, unknown> | undefined;
  if (error instanceof PipelineError) {
    category = error.category;
    details = Object.keys(error.details).length > 0 ? error.details : undefined;
  } else if (error instanceof DatabaseError) {
    category = 'DATABASE_ERROR';
    details = { code: error.code };
  } else if (error instanceof MigrationError) {
    category = 'DATABASE_ERROR';
    details = { operation: error.operation };
  } else if (error instanceof UsageError) {
    category = 'USAGE_ERROR';
  }
  return JSON.stringify({ success: false, error: { category, message: errorMessage(error), details } }, null, 2);
}

// ═══════════════════════════════════════════════════════════════════════════════
// COMMANDS
// ═══════════════════════════════════════════════════════════════════════════════

function requirePositional(positionals: string[], index: number, name: string): string {
  const value = positionals[index];
  if (value === undefined || value.trim() === '') {
    throw new UsageError(`Missing <${name}>`);
  }
  return value;
}

function parseTimeout(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new UsageError(`--timeout must be a non-negative integer, got "${raw}"`);
  }
  return value;
}

function parseTextStatusOption(raw: string | undefined): TextExtractionStatus | undefined {
  if (raw === undefined) return undefined;
  const match = TEXT_STATUSES.find((s) => s === raw);
  if (!match) {
    throw new UsageError(`--status must be one of: ${TEXT_STATUSES.join(', ')}`);
  }
  return match;
}

async function dispatchCommand(
  app: App,
  command: string,
  positionals: string[],
  values: { type?: string; mime?: string; timeout?: string; status?: string }
): Promise<unknown> {
  switch (command) {
    case 'ingest': {
      const file = requirePositional(positionals, 1, 'file');
      if (!values.type) throw new UsageError('ingest requires --type <documentType>');
      return app.ingestor.ingestFile(file, values.type, values.mime);
    }
    case 'run': {
      const documentId = requirePositional(positionals, 1, 'documentId');
      return app.orchestrator.runPipeline(documentId, { timeoutMs: parseTimeout(values.timeout) });
    }
    case 'run-pending':
      return app.dispatcher.runPending({ timeoutMs: parseTimeout(values.timeout) });
    case 'status':
      return app.orchestrator.getStatus(requirePositional(positionals, 1, 'documentId'));
    case 'list':
      return app.statusModel.listDocuments({ textExtractionStatus: parseTextStatusOption(values.status) });
    case 'sweep':
      return app.sweep();
    case 'stats':
      return app.db.getCounts();
    case 'types':
      return app.documentTypes.keys();
    default:
      throw new UsageError(`Unknown command "${command}"`);
  }
}

const CLI_OPTIONS = {
  type: { type: 'string', short: 't' },
  mime: { type: 'string' },
  timeout: { type: 'string' },
  status: { type: 'string' },
  'data-path': { type: 'string' },
  help: { type: 'boolean', short: 'h' },
} as const;

function parseCliArgs(argv: string[]) {
  return parseArgs({ args: argv, options: CLI_OPTIONS, allowPositionals: true, strict: true });
}

/**
 * Run one CLI invocation
 *
 * @returns process exit code: 0 success, 1 command failure, 2 usage error
 */
export async function runCli(
  argv: string[],
  output: CliOutput = defaultOutput,
  appFactory: AppFactory = createApp
): Promise<number> {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    output.stdout(formatError(new UsageError(errorMessage(error))));
    output.stderr(USAGE);
    return 2;
  }

  const { values, positionals } = parsed;
  const command = positionals[0];
  if (values.help || command === undefined) {
    output.stderr(USAGE);
    return command === undefined && !values.help ? 2 : 0;
  }

  let app: App;
  try {
    app = appFactory({ dataPath: values['data-path'] });
  } catch (error) {
    console.error(`[CLI] Startup failed: ${errorMessage(error)}`);
    output.stdout(formatError(error));
    return 1;
  }

  try {
    const data = await dispatchCommand(app, command, positionals, values);
    output.stdout(formatSuccess(data));
    return 0;
  } catch (error) {
    output.stdout(formatError(error));
    if (error instanceof UsageError) {
      output.stderr(USAGE);
      return 2;
    }
    console.error(`[CLI] ${command} failed: ${errorMessage(error)}`);
    return 1;
  } finally {
    app.close();
  }
}
