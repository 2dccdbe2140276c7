/**
 * CLI Commands Module
 *
 * Command-line access to the annotation pipeline.
 *
 * Commands:
 * - annotate: Parse a Rust file, attach its comments and print or write the JSON tree
 * - comments: List the comments extracted from a file
 * - spans: List the node spans comments can attach to
 * - init: Write a documented default config file
 *
 * JSON goes to stdout; status, spinners and errors go to stderr.
 */

import { Command, Option } from 'commander';
import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';

import { annotateSource, type AnnotationResult } from '../engines/commentAnnotator.js';
import { extractComments, type Comment } from '../engines/commentExtractor.js';
import { ASSOCIATION_POLICIES, type AssociationPolicy } from '../engines/commentAssociator.js';
import { collectNodeSpans, isBlockIdentifier, itemIndexOf, type NodeSpan } from '../engines/nodeSpanCollector.js';
import { formatSpan } from '../engines/spanInfo.js';
import type { Item, SourceFile } from '../engines/syntaxTree.js';
import { parseSourceFile } from '../engines/syntaxTreeBuilder.js';
import { loadConfig, generateDefaultConfig, type Config } from '../storage/config.js';
import { toJSONString } from '../storage/syntaxJson.js';
import { fileNotFound, isSyntreeError } from '../errors/index.js';
import { writeOutputFile } from '../utils/atomicWrite.js';
import { createLogger, getLogger, LogLevel } from '../utils/logger.js';
import { expandTilde, getConfigPath } from '../utils/paths.js';

// ============================================================================
// Types
// ============================================================================

interface GlobalOptions {
  config?: string;
  logDir?: string;
  verbose?: boolean;
}

interface ExtractionFlags {
  lineComments?: boolean;
  blockComments?: boolean;
}

interface AnnotateOptions extends ExtractionFlags {
  policy?: string;
  compact?: boolean;
  pretty?: boolean;
}

interface ListOptions extends ExtractionFlags {
  json?: boolean;
}

interface InitOptions {
  force?: boolean;
}

// ============================================================================
// Output Formatters
// ============================================================================

function printSuccess(text: string): void {
  console.error(chalk.green('  ' + text));
}

function printError(text: string): void {
  console.error(chalk.red('  Error: ' + text));
}

function printInfo(label: string, value: string | number): void {
  console.error(chalk.gray(`  ${label}: `) + chalk.white(String(value)));
}

/**
 * Short human-readable label for an item
 */
export function itemLabel(item: Item): string {
  switch (item.kind) {
    case 'impl':
      return item.traitName ? `impl ${item.traitName} for ${item.selfType}` : `impl ${item.selfType}`;
    case 'use':
      return `use ${item.path}`;
    case 'foreignMod':
      return item.abi === undefined ? 'extern' : `extern "${item.abi}"`;
    case 'verbatim':
      return 'verbatim';
    default:
      return `${item.kind} ${item.name}`;
  }
}

/**
 * Format a comment as "span  kind  text"
 */
export function formatComment(comment: Comment): string {
  return `${chalk.gray(formatSpan(comment.span).padEnd(14))}  ${chalk.cyan(comment.kind.padEnd(5))}  ${comment.text}`;
}

/**
 * Format a node span as "identifier  span  label"
 */
export function formatNodeSpan(nodeSpan: NodeSpan, file: SourceFile): string {
  const index = itemIndexOf(nodeSpan.identifier);
  const item = index === null ? undefined : file.items[index];
  const label = item ? itemLabel(item) : '?';
  const suffix = isBlockIdentifier(nodeSpan.identifier) ? ' (body)' : '';
  return `${chalk.cyan(nodeSpan.identifier.padEnd(14))}  ${chalk.gray(formatSpan(nodeSpan.span).padEnd(14))}  ${label}${suffix}`;
}

// ============================================================================
// Shared Helpers
// ============================================================================

function isAssociationPolicy(value: string): value is AssociationPolicy {
  return ASSOCIATION_POLICIES.some((policy) => policy === value);
}

async function readSource(inputPath: string): Promise<string> {
  const resolved = path.resolve(inputPath);
  if (!fs.existsSync(resolved)) {
    throw fileNotFound(resolved);
  }
  return fs.promises.readFile(resolved, 'utf-8');
}

/**
 * Load the config file, explicit or from the working directory, and
 * apply command-line overrides
 */
export async function resolveConfig(
  globals: GlobalOptions,
  overrides: AnnotateOptions = {}
): Promise<Config> {
  const config = globals.config
    ? await loadConfig(path.resolve(expandTilde(globals.config)), { required: true })
    : await loadConfig(getConfigPath(process.cwd()));

  return {
    associationPolicy:
      overrides.policy !== undefined && isAssociationPolicy(overrides.policy)
        ? overrides.policy
        : config.associationPolicy,
    includeLineComments: overrides.lineComments ?? config.includeLineComments,
    includeBlockComments: overrides.blockComments ?? config.includeBlockComments,
    compactJson: overrides.compact ?? config.compactJson,
    prettyJson: overrides.pretty ?? config.prettyJson,
  };
}

function startSpinner(text: string): Ora | null {
  return process.stderr.isTTY ? ora({ text, stream: process.stderr }).start() : null;
}

// ============================================================================
// Commands
// ============================================================================

/**
 * Parse, annotate and emit the JSON tree
 */
async function annotateCommand(
  input: string,
  output: string | undefined,
  options: AnnotateOptions,
  globals: GlobalOptions
): Promise<void> {
  const config = await resolveConfig(globals, options);
  const source = await readSource(input);

  const spinner = startSpinner(`Annotating ${input}...`);
  let result: AnnotationResult;
  try {
    result = await annotateSource(source, input, {
      policy: config.associationPolicy,
      includeLineComments: config.includeLineComments,
      includeBlockComments: config.includeBlockComments,
    });
  } catch (error) {
    spinner?.fail(`Failed to annotate ${input}`);
    throw error;
  }
  spinner?.stop();

  const json = toJSONString(result.file, { compact: config.compactJson, pretty: config.prettyJson });

  if (output === undefined) {
    process.stdout.write(json + '\n');
    return;
  }

  await writeOutputFile(path.resolve(output), json);
  printSuccess(`Wrote ${output}`);
  printInfo('Policy', config.associationPolicy);
  printInfo('Comments', result.stats.comments);
  printInfo('Attached', result.stats.attached);
  printInfo('Residual', result.stats.residual);
}

/**
 * List extracted comments; no parsing involved
 */
async function commentsCommand(input: string, options: ListOptions, globals: GlobalOptions): Promise<void> {
  const config = await resolveConfig(globals, options);
  const source = await readSource(input);
  const comments = extractComments(source, {
    includeLineComments: config.includeLineComments,
    includeBlockComments: config.includeBlockComments,
  });

  if (options.json) {
    console.log(JSON.stringify(comments, null, 2));
    return;
  }

  for (const comment of comments) {
    console.log(formatComment(comment));
  }
  printInfo('Total', comments.length);
}

/**
 * List the spans comments can attach to
 */
async function spansCommand(input: string, options: ListOptions): Promise<void> {
  const source = await readSource(input);

  const spinner = startSpinner(`Parsing ${input}...`);
  let file: SourceFile;
  try {
    file = await parseSourceFile(source, input);
  } catch (error) {
    spinner?.fail(`Failed to parse ${input}`);
    throw error;
  }
  spinner?.stop();

  const nodeSpans = collectNodeSpans(file);

  if (options.json) {
    console.log(JSON.stringify(nodeSpans, null, 2));
    return;
  }

  for (const nodeSpan of nodeSpans) {
    console.log(formatNodeSpan(nodeSpan, file));
  }
  printInfo('Items', file.items.length);
  printInfo('Spans', nodeSpans.length);
}

/**
 * Write a default config file in the working directory
 */
async function initCommand(options: InitOptions, globals: GlobalOptions): Promise<void> {
  const configPath = globals.config ? path.resolve(expandTilde(globals.config)) : getConfigPath(process.cwd());

  if (fs.existsSync(configPath) && !options.force) {
    console.error(chalk.yellow(`  Config already exists: ${configPath}`));
    console.error(chalk.gray('  Use ') + chalk.cyan('--force') + chalk.gray(' to overwrite.'));
    return;
  }

  await generateDefaultConfig(configPath);
  printSuccess(`Created ${configPath}`);
}

// ============================================================================
// Error Handling
// ============================================================================

/**
 * Report an error on stderr and mark the process as failed
 */
function handleError(error: unknown): void {
  const debug = Boolean(process.env.DEBUG || process.env.SYNTREE_COMMENTS_DEBUG);

  if (isSyntreeError(error)) {
    printError(error.userMessage);
    if (debug) {
      console.error(chalk.gray('  Developer: ' + error.developerMessage));
    }
  } else if (error instanceof Error) {
    printError(error.message);
    if (debug) {
      console.error(chalk.gray('  Stack: ' + error.stack));
    }
  } else {
    printError(String(error));
  }

  if (!debug) {
    console.error(chalk.gray('  For more details, run with DEBUG=1 environment variable'));
  }

  process.exitCode = 1;
}

// ============================================================================
// CLI Program
// ============================================================================

function extractionOptions(command: Command): Command {
  return command
    .option('--line-comments', 'Extract // comments')
    .option('--no-line-comments', 'Skip // comments')
    .option('--block-comments', 'Extract /* */ comments')
    .option('--no-block-comments', 'Skip /* */ comments');
}

/**
 * Create and configure the CLI program
 */
export function createCLI(): Command {
  const program = new Command();

  program
    .name('syntree-comments')
    .description('Attach source comments to the Rust syntax tree and emit it as JSON')
    .version(getVersion(), '-v, --version', 'Show version number')
    .option('-c, --config <path>', 'Config file (default: ./syntree-comments.json)')
    .option('--log-dir <dir>', 'Write logs to files in this directory')
    .option('--verbose', 'Show debug logging')
    .hook('preAction', () => {
      const globals = program.opts<GlobalOptions>();
      const logger = globals.logDir ? createLogger(path.resolve(expandTilde(globals.logDir))) : getLogger();
      if (globals.verbose) {
        logger.setLevel(LogLevel.DEBUG);
      }
    });

  extractionOptions(
    program
      .command('annotate <input> [output]')
      .description('Annotate a Rust file and print the JSON tree, or write it to <output>')
      .addOption(new Option('-p, --policy <policy>', 'Association policy').choices([...ASSOCIATION_POLICIES]))
      .option('--compact', 'Omit spans from the output')
      .option('--pretty', 'Indent the output')
      .option('--no-pretty', 'Write the output on one line')
  ).action((input: string, output: string | undefined, options: AnnotateOptions) =>
    annotateCommand(input, output, options, program.opts<GlobalOptions>())
  );

  extractionOptions(
    program
      .command('comments <input>')
      .description('List the comments found in a file')
      .option('--json', 'Output as JSON')
  ).action((input: string, options: ListOptions) => commentsCommand(input, options, program.opts<GlobalOptions>()));

  program
    .command('spans <input>')
    .description('List the declaration and body spans of a Rust file')
    .option('--json', 'Output as JSON')
    .action((input: string, options: ListOptions) => spansCommand(input, options));

  program
    .command('init')
    .description('Write a default config file')
    .option('-f, --force', 'Overwrite an existing config file')
    .action((options: InitOptions) => initCommand(options, program.opts<GlobalOptions>()));

  return program;
}

const PackageJsonSchema = z.object({ version: z.string() });

/**
 * Get package version
 */
function getVersion(): string {
  try {
    const packageJsonPath = new URL('../../package.json', import.meta.url);
    const parsed = PackageJsonSchema.safeParse(JSON.parse(fs.readFileSync(packageJsonPath, 'utf-8')));
    return parsed.success ? parsed.data.version : '0.0.0';
  } catch {
    return '0.0.0';
  }
}

/**
 * Run the CLI
 */
export async function runCLI(args: string[]): Promise<void> {
  const program = createCLI();
  try {
    await program.parseAsync(args, { from: 'node' });
  } catch (error) {
    handleError(error);
  } finally {
    await getLogger().flush();
  }
}
