#!/usr/bin/env node

import "dotenv/config";
import { config as dotenvLocal } from "dotenv";
dotenvLocal({ path: ".env.local", override: true });

import fs from "node:fs";
import { Command, InvalidArgumentError } from "commander";
import ora from "ora";
import { createChatGenerator } from "./adapters/index.js";
import { runAdvice } from "./advise.js";
import { createRecommendationClient } from "./client.js";
import { getRecordsPath, loadSettings } from "./config.js";
import { createPanelActions } from "./panels.js";
import type { PromptRequest } from "./prompt.js";
import { createRecordStore } from "./records/store.js";
import { createApp } from "./server.js";
import { CATEGORIES } from "./types.js";
import type { Category, PetProfile, Settings } from "./types.js";
import { parseImportedProfile, parseProfileForm } from "./ui/form.js";
import { monthName } from "./utils/time.js";
import { log } from "./utils/logger.js";

const program = new Command();

program
  .name("petcare")
  .description("AI pet care recommendations: web UI, records and PDF reports")
  .version("0.1.0");

function parseCategory(value: string): Category {
  const category = CATEGORIES.find((c) => c === value);
  if (!category) {
    throw new InvalidArgumentError(`Expected one of: ${CATEGORIES.join(", ")}`);
  }
  return category;
}

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new InvalidArgumentError("Port must be an integer between 1 and 65535");
  }
  return port;
}

function resolveSettings(opts: { config?: string; records?: string }): Settings {
  const settings = loadSettings(opts.config);
  return opts.records ? { ...settings, recordsFile: opts.records } : settings;
}

function displayName(settings: Settings): string {
  return settings.model.displayName ?? settings.model.model;
}

program
  .command("serve")
  .description("Start the pet care web UI")
  .option("-p, --port <port>", "Port to serve on", parsePort)
  .option("-c, --config <path>", "Path to petcare.yaml config file")
  .option("--records <path>", "Path to the JSON records file")
  .action((opts: { port?: number; config?: string; records?: string }) => {
    try {
      const settings = resolveSettings(opts);
      const store = createRecordStore(getRecordsPath(settings));
      const client = createRecommendationClient(
        createChatGenerator(settings.model),
      );
      const server = createApp({
        actions: createPanelActions({ client, store }),
        store,
        modelName: displayName(settings),
      });

      const port = opts.port ?? settings.port;
      const url = `http://localhost:${port}/`;
      log.info(`Using ${displayName(settings)} (${settings.model.provider})`);
      log.dim(`Records file: ${store.filePath}`);
      server.listen(port, () => {
        log.success(`Server running at ${url}`);
        log.dim("Press Ctrl+C to stop");
      });
    } catch (err) {
      log.error(err instanceof Error ? err.message : String(err));
      process.exit(1);
    }
  });

interface AdviseOptions {
  name: string;
  species: string;
  breed: string;
  age: string;
  weight: string;
  health: string;
  foods: string;
  allergies: string;
  previous?: string;
  save?: boolean;
  pdf?: string;
  config?: string;
  records?: string;
}

function readPrevious(file: string): PetProfile {
  const imported = parseImportedProfile(fs.readFileSync(file, "utf-8"));
  if (!imported.ok) throw new Error(imported.error);
  return imported.profile;
}

program
  .command("advise")
  .description("Generate one category of recommendations in the terminal")
  .argument("<category>", `One of: ${CATEGORIES.join(", ")}`, parseCategory)
  .option("--name <name>", "Pet's name", "")
  .option("--species <species>", "Dog or Cat", "Dog")
  .option("--breed <breed>", "Breed", "")
  .option("--age <years>", "Age in years (0-30)", "1")
  .option("--weight <kg>", "Weight in kg (0-100)", "5")
  .option("--health <text>", "Health conditions", "")
  .option("--foods <text>", "Favorite foods", "")
  .option("--allergies <text>", "Known allergies", "")
  .option("--previous <file>", "Previously exported record (for comparison)")
  .option("--save", "Append the profile to the records file")
  .option("--pdf <file>", "Write a PDF report (care only, includes the diet guide)")
  .option("-c, --config <path>", "Path to petcare.yaml config file")
  .option("--records <path>", "Path to the JSON records file")
  .action(async (category: Category, opts: AdviseOptions) => {
    try {
      const settings = resolveSettings(opts);
      const parsed = parseProfileForm(
        {
          name: opts.name,
          species: opts.species,
          breed: opts.breed,
          age: opts.age,
          weight: opts.weight,
          healthConditions: opts.health,
          favoriteFoods: opts.foods,
          allergies: opts.allergies,
        },
        new Date(),
      );
      if (!parsed.ok) throw new Error(parsed.errors.join("; "));
      const profile = parsed.profile;

      let request: PromptRequest;
      if (category === "seasonal") {
        request = { category, profile, month: monthName(new Date()) };
      } else if (category === "comparison") {
        if (!opts.previous) {
          throw new Error("--previous <file> is required for comparison");
        }
        request = { category, profile, previous: readPrevious(opts.previous) };
      } else {
        request = { category, profile };
      }

      const client = createRecommendationClient(
        createChatGenerator(settings.model),
      );
      const store = createRecordStore(getRecordsPath(settings));
      const spinner = ora().start();
      const result = await runAdvice(
        {
          client,
          store,
          onStep: (step) => {
            spinner.text = `${displayName(settings)} — generating ${step} recommendations...`;
          },
        },
        request,
        { report: opts.pdf !== undefined, save: opts.save },
      );

      if (result.errors.length > 0) spinner.fail(result.errors.join("\n"));
      else spinner.succeed(`${category} recommendations ready`);
      if (result.text !== undefined) console.log(`\n${result.text}\n`);
      for (const warning of result.warnings) log.warn(warning);

      if (result.errors.length > 0) {
        if (opts.pdf || opts.save) {
          log.warn("A recommendation failed; no report written and no record saved");
        }
        process.exitCode = 1;
        return;
      }

      if (opts.pdf && result.report) {
        fs.writeFileSync(opts.pdf, result.report);
        log.success(`Report written: ${opts.pdf}`);
      }
      if (result.saved) {
        log.success(`Record saved at ${result.saved.timestamp} → ${store.filePath}`);
      }
    } catch (err) {
      log.error(err instanceof Error ? err.message : String(err));
      process.exit(1);
    }
  });

program
  .command("records")
  .description("List saved health records")
  .option("-c, --config <path>", "Path to petcare.yaml config file")
  .option("--records <path>", "Path to the JSON records file")
  .action((opts: { config?: string; records?: string }) => {
    try {
      const store = createRecordStore(getRecordsPath(resolveSettings(opts)));
      const records = store.loadAll();

      if (records.length === 0) {
        log.warn(`No records found in ${store.filePath}`);
        return;
      }

      console.log(`\n📋 Health records (${records.length}):\n`);
      for (const r of records) {
        console.log(
          `  ${r.timestamp.padEnd(21)} ${(r.name || "-").padEnd(15)} ${r.species} · ${r.breed || "-"} · ${r.age} years · ${r.weight} kg`,
        );
        if (r.healthConditions) {
          console.log(`  ${"".padEnd(21)} health: ${r.healthConditions}`);
        }
      }
      console.log();
    } catch (err) {
      log.error(err instanceof Error ? err.message : String(err));
      process.exit(1);
    }
  });

// Default: show help
program.action(() => {
  program.help();
});

await program.parseAsync();
