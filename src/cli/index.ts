#!/usr/bin/env node
/**
 * lexitone CLI -- `synthesize` writes a WAV file from text,
 * `phonemize` prints the resolved phonemes without running the models.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { config } from '../config/index.js';
import { getErrorMessage } from '../infra/errors.js';
import {
    formatPhonemes,
    parseBitDepthOption,
    parseNumberOption,
    phonemizeCommand,
    synthesizeCommand,
    type PhonemizeCommandOptions,
    type SynthesizeCommandOptions,
} from './commands.js';

const program = new Command();

program
    .name('lexitone')
    .description('lexitone: lexicon-driven Chinese/English text-to-speech.')
    .version(config.version);

program
    .command('synthesize')
    .description('Synthesize text into a WAV file')
    .argument('<text>', 'Text to speak')
    .option('-m, --model-dir <path>', 'Model directory', config.tts.modelDir)
    .option('-o, --output <path>', 'Output WAV file', 'output.wav')
    .option('-l, --language <tag>', 'Language (zh, en)', config.tts.language)
    .option('-s, --speed <number>', 'Speaking speed, 1.0 is normal', parseNumberOption, config.tts.speed)
    .option('--speaker <id>', 'Speaker ID', parseNumberOption, config.tts.speakerId)
    .option('-r, --sample-rate <hz>', 'Sample rate written to the WAV header', parseNumberOption)
    .option('-b, --bit-depth <bits>', 'WAV bit depth (16, 24, 32)', parseBitDepthOption, config.tts.bitDepth)
    .option('--no-enhance', 'Only enhance audio that measures quiet or sparse')
    .option('-v, --verbose', 'Log every pipeline stage', false)
    .action(async (text: string, options: SynthesizeCommandOptions) => {
        try {
            const output = await synthesizeCommand(text, { ...options, enhance: options.enhance && config.tts.enhance });
            console.log(`  ${chalk.green('Wrote')} ${output}`);
        } catch (err) {
            console.error(`  ${chalk.red('Synthesis failed:')}`, getErrorMessage(err));
            process.exit(1);
        }
    });

program
    .command('phonemize')
    .description('Print the phonemes and tones resolved for text')
    .argument('<text>', 'Text to resolve')
    .option('-m, --model-dir <path>', 'Model directory', config.tts.modelDir)
    .option('-l, --language <tag>', 'Language (zh, en)', config.tts.language)
    .option('-v, --verbose', 'Log every pipeline stage', false)
    .action((text: string, options: PhonemizeCommandOptions) => {
        try {
            console.log(formatPhonemes(phonemizeCommand(text, options)));
        } catch (err) {
            console.error(`  ${chalk.red('Phonemization failed:')}`, getErrorMessage(err));
            process.exit(1);
        }
    });

program.parseAsync().catch((err: unknown) => {
    console.error(`  ${chalk.red('Error:')}`, getErrorMessage(err));
    process.exit(1);
});
