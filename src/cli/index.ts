#!/usr/bin/env node
/**
 * CLI - command-line interface for the sentiment analytics service
 *
 * Commands:
 * - sentiment-analytics start            - Start the HTTP gateway
 * - sentiment-analytics analyze <text>   - Classify one text and print the result
 * - sentiment-analytics doctor           - Check configuration, credentials and storage
 */

import { Command } from 'commander';
import { runService } from '../index';
import { loadConfig } from '../utils/config';
import { logger } from '../utils/logger';
import { createProviders } from '../context';
import { classifyEmotion, createHeuristicScorer, createSentimentResolver } from '../services/sentiment';
import { doctor } from './commands/doctor';

const program = new Command();

program
  .name('sentiment-analytics')
  .description('Tweet sentiment classification and analytics')
  .version('0.1.0')
  .option('-c, --config <path>', 'Path to a JSON5 config file');

// Start command
program
  .command('start')
  .description('Start the HTTP gateway')
  .action(async () => {
    await runService(program.opts<{ config?: string }>().config);
  });

// Analyze command
program
  .command('analyze <text>')
  .description('Classify a single text with the provider chain and print the result')
  .option('--local', 'Skip remote providers and use the heuristic scorer only')
  .action(async (text: string, options: { local?: boolean }) => {
    const config = await loadConfig(program.opts<{ config?: string }>().config);
    const scorer = createHeuristicScorer();
    const providers = options.local ? [] : createProviders(config);
    const resolver = createSentimentResolver(providers, scorer);

    const result = await resolver.resolve(text);
    const { polarity, subjectivity } = scorer.score(text);
    console.log(
      JSON.stringify(
        { ...result, polarity, subjectivity, emotion: classifyEmotion(polarity, subjectivity) },
        null,
        2,
      ),
    );
  });

// Doctor command
program
  .command('doctor')
  .description('Run diagnostics on configuration, credentials and storage')
  .action(async () => {
    await doctor(program.opts<{ config?: string }>().config);
  });

program.parseAsync().catch((err) => {
  logger.error({ err }, 'Command failed');
  process.exit(1);
});
