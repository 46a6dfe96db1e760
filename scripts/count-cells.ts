#!/usr/bin/env npx tsx
/**
 * CLI for the IDR cell-counting walkthrough
 */
import dotenv from 'dotenv';
import { createClient } from '../src/lib/client';
import { parseArgs, type CliCommand, type CliConfig } from '../src/lib/config';
import { ConfigError } from '../src/lib/errors';
import type { ProjectSelection } from '../src/lib/metadata';
import { logErrorDetails } from '../src/lib/utils';
import { runWalkthrough } from '../src/lib/walkthrough';

dotenv.config();

function printHelp(defaults: CliConfig) {
  const projectIndex = defaults.project.by === 'index' ? defaults.project.index : 87;
  console.log(`
Usage: npx tsx scripts/count-cells.ts [options]

Lists the experiment projects of the Image Data Resource, opens one project,
dataset and image, and counts cells in the image by thresholding.

Outputs (in --out-dir):
  projectTable.xlsx, MontageFigure.png, FullImageFigure.png,
  GrayImageFigure.png, BWImageFigure.png, ImageWithCentroidsFigure.png

Options:
      --base-url <url>          Gateway base URL (default: ${defaults.baseUrl})
      --out-dir <dir>           Output directory (default: ${defaults.outDir})
      --project <id>            Select the project by id
      --project-index <n>       Select by row of the project table, 1-based (default: ${projectIndex})
      --project-title <text>    Select by publication title
      --experiment <name>       Experiment under the selected title (default: first)
      --dataset-index <n>       Dataset within the project, 1-based (default: ${defaults.datasetIndex})
      --image-index <n>         Image within the dataset, 1-based (default: ${defaults.imageIndex})
      --threshold <n>           Foreground if gray level > n, 0-255 (default: ${defaults.threshold})
      --min-pixel-count <n>     Drop regions with n pixels or fewer (default: ${defaults.minPixelCount})
      --smoothing <n>           Outline smoothing window, 1=off (default: ${defaults.smoothingWindow})
      --thumb-concurrency <n>   Parallel thumbnail requests (default: ${defaults.thumbConcurrency})
      --timeout <ms>            HTTP timeout, 0=none (default: ${defaults.timeoutMs})
  -h, --help                    Show help
`);
}

function loadCommand(): CliCommand {
  try {
    return parseArgs(process.argv.slice(2), process.env);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`❌ ${error.message}`);
      process.exit(1);
    }
    throw error;
  }
}

function describeSelection(selection: ProjectSelection): string {
  if (selection.by === 'id') return `id ${selection.id}`;
  const experiment = selection.experiment ? `, experiment "${selection.experiment}"` : '';
  if (selection.by === 'index') return `row ${selection.index}${experiment}`;
  return `title "${selection.title}"${experiment}`;
}

async function main() {
  const command = loadCommand();
  if (command.help) {
    printHelp(command.config);
    return;
  }
  const { baseUrl, timeoutMs, ...config } = command.config;

  console.log(`🔬 Starting cell-count walkthrough...`);
  console.log(`   Gateway: ${baseUrl}`);
  console.log(`   Output:  ${config.outDir}/`);
  console.log(`   Project: ${describeSelection(config.project)} | Dataset: ${config.datasetIndex} | Image: ${config.imageIndex}`);

  const client = createClient({ baseUrl, timeoutMs });
  const result = await runWalkthrough(client, config);
  console.log(`\n🎉 Done! ${result.regions.length} cell(s), ${result.written.length} file(s) written.`);
}

main().catch((error) => {
  logErrorDetails('❌ ', error);
  process.exit(1);
});
