#!/usr/bin/env npx tsx
/**
 * CLI: audit a batch of annotation tasks and print the flagged issues
 */
import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import { loadConfigFromEnv, parseCheckList, type EvaluatorConfigInput } from '../src/lib/config';
import { TaskBatchEvaluator } from '../src/lib/evaluator';
import { HttpImageFetcher } from '../src/lib/image-fetcher';
import { createLogger } from '../src/lib/logger';
import { formatReport, type ReportFormat } from '../src/lib/report';
import { AnnotationPlatformClient, loadTasksFromFile } from '../src/lib/task-source';
import type { Task } from '../src/lib/types';

dotenv.config();

function printHelp() {
  console.log(`
Usage: npx tsx scripts/audit-tasks.ts <tasks.json> [options]
       npx tsx scripts/audit-tasks.ts --project <name> [options]

Runs the occlusion, stray-click and color checks over every task and prints
the flagged annotations. Without an input file, tasks are listed from the
annotation platform using ANNOTATION_API_KEY.

Options:
  -i, --input <path>        Tasks JSON file (array of tasks or { docs: [...] })
      --project <name>      Remote listing: project filter
      --status <status>     Remote listing: status filter
      --limit <n>           Remote listing: max tasks
      --threshold <n>       Occlusion threshold in percent (default: 40)
      --ordered-pairs       Check every ordered annotation pair (each hit reported twice)
      --checks <list>       Comma-separated checks (occlusion,stray_click,color,geometry)
      --format <fmt>        Output format: text|json (default: text)
  -o, --output <path>       Write the report to a file instead of stdout
      --debug-images <dir>  Keep a copy of each downloaded image
      --debug               Verbose logging
  -h, --help                Show help
`);
}

function requireValue(args: string[], index: number, flag: string): string {
  const value = args[index + 1];
  if (!value || value.startsWith('-')) {
    console.error(`❌ Missing value for ${flag}`);
    process.exit(1);
  }
  return value;
}

type CLIConfig = {
  input: string | null;
  project?: string;
  status?: string;
  limit?: number;
  format: ReportFormat;
  output: string | null;
  debugImages: string | null;
  overrides: EvaluatorConfigInput;
};

function parseArgs(): CLIConfig {
  const args = process.argv.slice(2);
  const config: CLIConfig = {
    input: null,
    format: 'text',
    output: null,
    debugImages: null,
    overrides: {},
  };

  const positionalArgs: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '-i':
      case '--input':
        config.input = requireValue(args, i, arg);
        i++;
        break;
      case '--project':
        config.project = requireValue(args, i, arg);
        i++;
        break;
      case '--status':
        config.status = requireValue(args, i, arg);
        i++;
        break;
      case '--limit': {
        const value = Number(requireValue(args, i, arg));
        if (!Number.isInteger(value) || value < 1) {
          console.error(`❌ Invalid value for ${arg}: ${args[i + 1]} (must be a positive integer)`);
          process.exit(1);
        }
        config.limit = value;
        i++;
        break;
      }
      case '--threshold': {
        const value = Number(requireValue(args, i, arg));
        if (!Number.isFinite(value) || value < 0 || value > 100) {
          console.error(`❌ Invalid value for ${arg}: ${args[i + 1]} (must be 0-100)`);
          process.exit(1);
        }
        config.overrides.occlusionThreshold = value;
        i++;
        break;
      }
      case '--ordered-pairs':
        config.overrides.occlusionPairMode = 'ordered';
        break;
      case '--checks':
        config.overrides.checks = parseCheckList(requireValue(args, i, arg));
        i++;
        break;
      case '--format': {
        const value = requireValue(args, i, arg);
        if (value !== 'text' && value !== 'json') {
          console.error(`❌ Invalid value for ${arg}: ${value} (must be text or json)`);
          process.exit(1);
        }
        config.format = value;
        i++;
        break;
      }
      case '-o':
      case '--output':
        config.output = requireValue(args, i, arg);
        i++;
        break;
      case '--debug-images':
        config.debugImages = requireValue(args, i, arg);
        i++;
        break;
      case '--debug':
        config.overrides.debug = true;
        break;
      case '-h':
      case '--help':
        printHelp();
        process.exit(0);
      default:
        if (arg.startsWith('-')) {
          console.warn(`⚠️ Unknown argument ignored: ${arg}`);
        } else {
          positionalArgs.push(arg);
        }
    }
  }

  if (!config.input && positionalArgs.length > 0) {
    config.input = positionalArgs[0];
  }

  if (config.input && !fs.existsSync(config.input)) {
    console.error(`❌ Tasks file not found: ${config.input}`);
    process.exit(1);
  }

  return config;
}

async function loadTasks(cli: CLIConfig, debug: boolean): Promise<Task[]> {
  if (cli.input) {
    console.log(`📂 Loading tasks from ${cli.input}`);
    return loadTasksFromFile(cli.input);
  }

  console.log(`🌐 Listing tasks from the annotation platform...`);
  const client = new AnnotationPlatformClient({
    apiKey: process.env.ANNOTATION_API_KEY,
    baseUrl: process.env.ANNOTATION_API_URL || undefined,
    debug,
  });
  return client.listTasks({ project: cli.project, status: cli.status, limit: cli.limit });
}

async function main() {
  try {
    const cli = parseArgs();
    const config = loadConfigFromEnv(process.env, cli.overrides);
    const tasks = await loadTasks(cli, config.debug);
    console.log(`🔍 Auditing ${tasks.length} tasks (checks: ${config.checks.join(', ')})`);

    const fetcher = new HttpImageFetcher({
      timeoutMs: config.imageTimeoutMs,
      debugDir: cli.debugImages ?? undefined,
      debug: config.debug,
    });
    const evaluator = new TaskBatchEvaluator({ config, fetcher });
    const report = await evaluator.evaluate(tasks);
    const rendered = formatReport(report, cli.format);

    if (cli.output) {
      fs.mkdirSync(path.dirname(path.resolve(cli.output)), { recursive: true });
      fs.writeFileSync(cli.output, rendered);
      console.log(`💾 Report written to ${cli.output}`);
    } else {
      console.log(`\n${rendered}`);
    }

    console.log(`✅ Done: ${report.count} potential issues`);
  } catch (error) {
    createLogger('').error('❌ ', error);
    process.exit(1);
  }
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
