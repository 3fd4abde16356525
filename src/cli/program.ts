import type { Readable } from "node:stream";

import { Command, CommanderError } from "commander";
import { ZodError } from "zod";

import i18n from "../i18n/i18n";
import { describeError } from "../shared/errors";
import { resolveSettings } from "../shared/settings";
import type { DomainLookupResult, LookupSettings } from "../shared/types";
import { queryBatch } from "../shared/utils/batch";
import { readLines, readLinesFromFile } from "../shared/utils/file";
import { formatResultLine, toResultRecord } from "../shared/utils/status";

type CliOptions = {
  file?: string;
  concurrency?: string;
  timeout?: string;
  json?: boolean;
  verbose?: boolean;
};

/**
 * CLI 的外部依赖，测试时可整体替换。
 */
export interface CliIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  stdin: Readable & { isTTY?: boolean };
  env: NodeJS.ProcessEnv;
  queryBatch: (
    domains: readonly string[],
    concurrency: number,
    timeoutSeconds: number,
    deps: { bootstrapUrl?: string }
  ) => Promise<DomainLookupResult[]>;
}

export const defaultCliIo: CliIo = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
  stdin: process.stdin,
  env: process.env,
  queryBatch
};

/**
 * 按优先级读取域名列表：文件 > 管道 stdin > 命令行参数。
 */
async function readDomains(options: CliOptions, args: string[], io: CliIo): Promise<string[]> {
  if (options.file) {
    return readLinesFromFile(options.file);
  }
  if (!io.stdin.isTTY) {
    return readLines(io.stdin);
  }
  return args;
}

function describeSettingsError(error: unknown): string {
  if (error instanceof ZodError) {
    return error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
  }
  return describeError(error);
}

/**
 * 执行 CLI 并返回进程退出码；任一域名查询失败时为 1。
 * @param argv 完整的 process.argv 形式参数
 */
export async function runCli(argv: readonly string[], io: CliIo = defaultCliIo): Promise<number> {
  let exitCode = 0;

  const program = new Command()
    .name("domain-lookup")
    .description(i18n.t("cli.description"))
    .argument("[domains...]")
    .option("-f, --file <path>", i18n.t("cli.option.file"))
    .option("-c, --concurrency <n>", i18n.t("cli.option.concurrency"))
    .option("-t, --timeout <seconds>", i18n.t("cli.option.timeout"))
    .option("-j, --json", i18n.t("cli.option.json"))
    .option("-v, --verbose", i18n.t("cli.option.verbose"))
    .exitOverride()
    .configureOutput({ writeOut: io.stdout, writeErr: io.stderr });

  program.action(async (args: string[]) => {
    const options = program.opts<CliOptions>();

    let settings: LookupSettings;
    try {
      const overrides: Partial<Record<keyof LookupSettings, string>> = {};
      if (options.concurrency !== undefined) {
        overrides.concurrency = options.concurrency;
      }
      if (options.timeout !== undefined) {
        overrides.timeoutSeconds = options.timeout;
      }
      settings = resolveSettings(io.env, overrides);
    } catch (error) {
      io.stderr(`${i18n.t("cli.error.invalid-settings", { reason: describeSettingsError(error) })}\n`);
      exitCode = 1;
      return;
    }

    let domains: string[];
    try {
      domains = await readDomains(options, args, io);
    } catch (error) {
      io.stderr(`${i18n.t("cli.error.read-input", { reason: describeError(error) })}\n`);
      exitCode = 1;
      return;
    }

    if (domains.length === 0) {
      program.outputHelp({ error: true });
      exitCode = 1;
      return;
    }

    const results = await io.queryBatch(domains, settings.concurrency, settings.timeoutSeconds, {
      bootstrapUrl: settings.bootstrapUrl
    });

    if (options.json) {
      io.stdout(`${JSON.stringify(results.map(toResultRecord), null, 2)}\n`);
      return;
    }

    for (const result of results) {
      const line = `${formatResultLine(result, options.verbose ?? false)}\n`;
      if (result.status === "unknown") {
        io.stderr(line);
        exitCode = 1;
      } else {
        io.stdout(line);
      }
    }
  });

  try {
    await program.parseAsync([...argv]);
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  return exitCode;
}
