#!/usr/bin/env node

import { Command, Option } from "commander";
import { PACKAGE_NAME, PACKAGE_VERSION } from "./branding/branding.js";
import { composeVersion } from "./commands/compose.js";
import { createContext, type CommandContext } from "./commands/context.js";
import { EXIT, toFailure, type CommandFailure } from "./commands/exit-codes.js";
import { fetchFile, type DownloadResult } from "./commands/fetch.js";
import { mirrorFile } from "./commands/mirror.js";
import { validateAll } from "./commands/validate.js";
import { listVersions } from "./commands/versions.js";
import { DEFAULT_CONFIG_DIR } from "./config/loader.js";
import type { OutputFormat } from "./log/logger.js";

type CommonOpts = { config?: string; env?: string; format: OutputFormat };

const program = new Command();

program
  .name(PACKAGE_NAME)
  .description("Fetch, verify and compose game version metadata")
  .version(PACKAGE_VERSION);

function formatOption(): Option {
  return new Option("--format <format>", "Output format").choices(["human", "jsonl"]).default("human");
}

function withCommonOptions(cmd: Command): Command {
  return cmd
    .option("--config <path>", "Path to config directory")
    .option("--env <name>", "Config environment layer (config/<name>.yaml)")
    .addOption(formatOption());
}

function reportFailure(format: OutputFormat, failure: CommandFailure): never {
  if (format === "jsonl") {
    process.stdout.write(JSON.stringify({ level: "error", code: failure.code, message: failure.error }) + "\n");
  } else {
    console.error(`${failure.code}: ${failure.error}`);
  }
  process.exit(failure.exitCode);
}

/** Build a context, run the handler, and release shared resources before anything is reported. */
async function withContext<R>(opts: CommonOpts, handler: (ctx: CommandContext) => Promise<R>): Promise<R> {
  let ctx: CommandContext;
  try {
    ctx = createContext({ configDir: opts.config, env: opts.env, format: opts.format });
  } catch (e) {
    reportFailure(opts.format, toFailure(e));
  }
  try {
    return await handler(ctx);
  } finally {
    await ctx.close();
  }
}

function reportDownload(format: OutputFormat, res: DownloadResult): void {
  if (!res.ok) reportFailure(format, res);
  if (format === "jsonl") {
    process.stdout.write(
      JSON.stringify({ level: "info", code: "OK", url: res.url, sha1: res.sha1, bytes: res.bytes.length, out: res.out }) + "\n",
    );
  } else if (res.out) {
    console.log(`${res.out}  ${res.sha1}  ${res.bytes.length} bytes`);
  } else {
    process.stdout.write(res.bytes);
  }
}

withCommonOptions(
  program
    .command("fetch")
    .description("Download one file, retrying and optionally verifying its SHA-1")
    .argument("<url>", "URL to download")
    .option("--sha1 <hex>", "Expected SHA-1 of the body")
    .option("--out <file>", "Write the body to a file instead of stdout"),
).action(async (url: string, opts: CommonOpts & { sha1?: string; out?: string }) => {
  const res = await withContext(opts, (ctx) => fetchFile({ url, sha1: opts.sha1, out: opts.out }, ctx));
  reportDownload(opts.format, res);
});

withCommonOptions(
  program
    .command("mirror")
    .description("Download a relative path through an ordered list of mirrors")
    .argument("<path>", "Path appended to each mirror prefix")
    .option("--mirror <prefix...>", "Mirror prefixes, tried in order (default: mirrors from config)")
    .option("--sha1 <hex>", "Expected SHA-1 of the body")
    .option("--out <file>", "Write the body to a file instead of stdout"),
).action(async (relPath: string, opts: CommonOpts & { mirror?: string[]; sha1?: string; out?: string }) => {
  const res = await withContext(opts, (ctx) =>
    mirrorFile({ path: relPath, mirrors: opts.mirror, sha1: opts.sha1, out: opts.out }, ctx),
  );
  reportDownload(opts.format, res);
});

withCommonOptions(
  program
    .command("versions")
    .description("List versions from the version manifest")
    .option("--url <url>", "Manifest URL (default: version_manifest_url from config)")
    .option("--type <type>", "Only list versions of this type: release|snapshot|old_alpha|old_beta"),
).action(async (opts: CommonOpts & { url?: string; type?: string }) => {
  const res = await withContext(opts, (ctx) => listVersions({ url: opts.url, type: opts.type }, ctx));
  if (!res.ok) reportFailure(opts.format, res);

  if (opts.format === "jsonl") {
    for (const v of res.versions) process.stdout.write(JSON.stringify(v) + "\n");
    return;
  }
  console.log(`latest release: ${res.latest.release}  latest snapshot: ${res.latest.snapshot}`);
  for (const v of res.versions) console.log(`${v.id}  ${v.type}  ${v.releaseTime}`);
});

withCommonOptions(
  program
    .command("compose")
    .description("Merge a loader version overlay over the game version it inherits from")
    .argument("<partial-url>", "URL of the loader's version document")
    .option("--manifest <url>", "Manifest URL (default: version_manifest_url from config)")
    .option("--out <file>", "Write the merged document to a file instead of stdout"),
).action(async (partialUrl: string, opts: CommonOpts & { manifest?: string; out?: string }) => {
  const res = await withContext(opts, (ctx) =>
    composeVersion({ partialUrl, manifestUrl: opts.manifest, out: opts.out }, ctx),
  );
  if (!res.ok) reportFailure(opts.format, res);

  if (opts.format === "jsonl") {
    process.stdout.write(JSON.stringify({ level: "info", code: "OK", id: res.version.id, out: res.out }) + "\n");
  } else if (res.out) {
    console.log(`${res.version.id} -> ${res.out}`);
  } else {
    console.log(JSON.stringify(res.version, null, 2));
  }
});

program
  .command("validate")
  .description("Validate the config layers and payload schemas")
  .option("--config <path>", "Path to config directory", DEFAULT_CONFIG_DIR)
  .option("--env <name>", "Config environment layer (config/<name>.yaml)")
  .addOption(formatOption())
  .action((opts: { config: string; env?: string; format: OutputFormat }) => {
    const res = validateAll({ configDir: opts.config, env: opts.env });

    if (!res.ok) {
      if (opts.format === "jsonl") {
        for (const err of res.errors) process.stdout.write(JSON.stringify(err) + "\n");
      } else {
        for (const err of res.errors) console.error(`${err.code}: ${err.message}`);
      }
      process.exit(EXIT.INVALID_ARGS);
    }

    if (opts.format === "jsonl") {
      process.stdout.write(JSON.stringify({ level: "info", code: "OK", schemas: res.schemas }) + "\n");
    } else {
      console.log(`OK (${res.schemas.length} schemas)`);
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(EXIT.FETCH_FAILED);
});
