#!/usr/bin/env node
/**
 * capscribe CLI - save a video's captions as a timestamped transcript
 */

import { readFileSync } from 'node:fs';
import { basename, dirname, extname, join } from 'node:path';
import { program } from 'commander';
import { z } from 'zod';
import {
  DEFAULT_CONFIG_PATH,
  describeError,
  listCaptionTracks,
  loadConfig,
  normalizeTranscript,
  requireVideoId,
  runTranscript,
} from './index';
import { readTextFile, writeTextFile } from './lib/fs';
import { DEFAULT_INTERVAL_SECONDS } from './lib/normalize';

// ANSI colors
const green = (s: string) => `\x1b[32m${s}\x1b[0m`;
const red = (s: string) => `\x1b[31m${s}\x1b[0m`;
const yellow = (s: string) => `\x1b[33m${s}\x1b[0m`;
const dim = (s: string) => `\x1b[2m${s}\x1b[0m`;

const { version } = z
  .object({ version: z.string() })
  .parse(JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8')));

function fail(error: unknown): never {
  console.error(red(describeError(error)));
  process.exit(1);
}

program
  .name('capscribe')
  .description('Download a video caption track and save it as a [MM:SS] transcript')
  .version(version);

// Default command: config-driven single run
program
  .command('run', { isDefault: true })
  .description('Fetch the transcript for the video named in the config file')
  .option('-c, --config <file>', 'Path to the JSON config file', DEFAULT_CONFIG_PATH)
  .option('-p, --print', 'Also print the transcript to stdout')
  .action(async (options: { config: string; print?: boolean }) => {
    try {
      const config = await loadConfig(options.config);
      const result = await runTranscript(config, {
        onStage: (_stage, detail) => console.log(dim(detail)),
        onWarning: (message) => console.warn(yellow(message)),
      });

      console.log(green(`\nTranscript saved to ${result.path} (${result.items.length} lines)`));
      if (options.print) {
        console.log(`\n${result.text}`);
      }
    } catch (error) {
      fail(error);
    }
  });

// Track listing
program
  .command('tracks <video>')
  .description('Show the caption tracks available for a video (ID or URL)')
  .action(async (video: string) => {
    try {
      const videoId = requireVideoId(video);
      const tracks = await listCaptionTracks(videoId);

      if (!tracks.length) {
        console.log(yellow('No captions available for this video'));
        return;
      }

      console.log(`Available caption tracks for ${videoId}:\n`);
      tracks.forEach((track, index) => {
        const marker = index === 0 ? green('*') : ' ';
        const type = track.kind === 'asr' ? dim('(auto-generated)') : '';
        console.log(`${marker} ${(track.languageCode ?? '?').padEnd(6)} ${track.name ?? ''} ${type}`);
      });
    } catch (error) {
      fail(error);
    }
  });

// Regroup an existing transcript into fixed windows
program
  .command('normalize <file>')
  .description('Merge transcript lines into fixed time windows')
  .option('-i, --interval <seconds>', 'Window length in seconds', String(DEFAULT_INTERVAL_SECONDS))
  .option('-o, --output <file>', 'Output file (default: <name>_normalized.txt)')
  .action(async (file: string, options: { interval: string; output?: string }) => {
    try {
      const interval = Number.parseInt(options.interval, 10);
      const content = await readTextFile(file);
      const normalized = normalizeTranscript(content, interval);

      const output =
        options.output ?? join(dirname(file), `${basename(file, extname(file))}_normalized${extname(file) || '.txt'}`);
      await writeTextFile(output, normalized);

      const lines = normalized ? normalized.split('\n').length : 0;
      console.log(green(`Written ${lines} lines (${interval}s windows) to ${output}`));
    } catch (error) {
      fail(error);
    }
  });

await program.parseAsync();
