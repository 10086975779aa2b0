#!/usr/bin/env node

import { Command } from 'commander';
import { resolveConfig, getApiKeys, type ConfigOverrides } from '../utils/config.js';
import { initLogger, getLogger, parseLogLevel } from '../utils/logger.js';
import { createSearchClient } from '../client/search-client.js';
import { evaluate } from '../evaluation/evaluate.js';
import { computeMetrics } from '../evaluation/metrics.js';
import { snowballingRecall } from '../evaluation/snowballing.js';
import { loadCitations, loadSearchResult, loadStudies, saveSearchResult } from '../storage/json-files.js';

const VERSION = '1.0.0';

const program = new Command();

program
    .name('slrsearch')
    .description('Run boolean search strings against Scopus and measure their recall against a gold standard.')
    .version(VERSION);

/**
 * Collect shared logging flags into config overrides, leaving unset flags out
 * so they do not shadow file or env values.
 */
function loggingFlags(opts: { logLevel?: string; jsonLogs?: boolean }): ConfigOverrides {
    const flags: ConfigOverrides = {};
    if (opts.logLevel) flags.logLevel = parseLogLevel(opts.logLevel);
    if (opts.jsonLogs) flags.jsonLogs = true;
    return flags;
}

function collectRepeated(value: string, previous: string[]): string[] {
    return [...previous, value];
}

// ─── SEARCH command ───────────────────────────────────────

program
    .command('search')
    .description('Fetch every result of one search string')
    .requiredOption('-q, --query <query>', 'Boolean search string')
    .option('-k, --api-key <key>', 'Scopus API key (repeatable; defaults to SCOPUS_API_KEYS)', collectRepeated, [])
    .option('-o, --out <path>', 'Write the collected result as JSON')
    .option('--max-rps <n>', 'Maximum requests per second across all keys')
    .option('--log-level <level>', 'Log level: debug | info | warn | error')
    .option('--json-logs', 'Output JSON logs', false)
    .action(async (opts) => {
        const flags = loggingFlags(opts);
        if (opts.maxRps) flags.maxRequestsPerSecond = parseInt(opts.maxRps, 10);

        const config = await resolveConfig(flags);
        initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
        const logger = getLogger();

        const keys: string[] = opts.apiKey.length > 0 ? opts.apiKey : getApiKeys();
        const client = createSearchClient(keys, config);

        try {
            const result = await client.collect(opts.query);
            logger.info(
                { totalResults: result.totalResults, entries: result.entries.length, truncated: result.truncated, ...client.stats() },
                'Search complete'
            );

            if (opts.out) {
                saveSearchResult(opts.out, result);
                console.log(`Saved ${result.entries.length} entries to ${opts.out}`);
            } else {
                for (const entry of result.entries) {
                    console.log(`${entry.id}\t${entry.title}`);
                }
            }
        } catch (error) {
            logger.error({ error }, 'Search failed');
            process.exit(1);
        }
    });

// ─── EVALUATE command ─────────────────────────────────────

program
    .command('evaluate')
    .description('Score a saved search result against the gold standard')
    .requiredOption('--gs <path>', 'Gold standard studies (JSON array)')
    .requiredOption('--qgs <path>', 'Quasi-gold standard studies (JSON array)')
    .requiredOption('-r, --results <path>', 'Search result saved by `slrsearch search --out`')
    .option('-t, --threshold <n>', 'Similarity needed to count a study as found')
    .option('-w, --workers <n>', 'Worker threads for matching')
    .option('-c, --citations <path>', 'Citation edges among GS studies (JSON array of { from, to })')
    .option('--log-level <level>', 'Log level: debug | info | warn | error')
    .option('--json-logs', 'Output JSON logs', false)
    .action(async (opts) => {
        const flags = loggingFlags(opts);
        const evaluationFlags: NonNullable<ConfigOverrides['evaluation']> = {};
        if (opts.threshold) evaluationFlags.threshold = parseFloat(opts.threshold);
        if (opts.workers) evaluationFlags.workers = parseInt(opts.workers, 10);
        flags.evaluation = evaluationFlags;

        const config = await resolveConfig(flags);
        initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
        const logger = getLogger();

        try {
            const gs = loadStudies(opts.gs);
            const qgs = loadStudies(opts.qgs);
            const result = loadSearchResult(opts.results);

            const report = await evaluate(
                result.entries.map((entry) => entry.title),
                gs,
                qgs,
                config.evaluation.threshold,
                { workers: config.evaluation.workers, parallelThreshold: config.evaluation.parallelThreshold }
            );
            const metrics = computeMetrics(report, result.totalResults, config.maxResults);

            console.log('\n📊 Search String Evaluation\n');
            console.log(`  Results:     ${result.totalResults}${result.truncated ? ` (first ${config.maxResults} retrievable)` : ''}`);
            console.log(`  GS recall:   ${report.gsRecall.toFixed(3)} (${report.gsFound.length}/${report.gsSize})`);
            console.log(`  QGS recall:  ${report.qgsRecall.toFixed(3)} (${report.qgsFound.length}/${report.qgsSize})`);
            console.log(`  Precision:   ${metrics.precision.toFixed(4)}`);
            console.log(`  F1:          ${metrics.f1.toFixed(4)}`);

            if (opts.citations) {
                const snowballing = snowballingRecall(report, gs, loadCitations(opts.citations));
                console.log(`  + BSB:       ${snowballing.backwardRecall.toFixed(3)}`);
                console.log(`  + BSB + FSB: ${snowballing.backwardForwardRecall.toFixed(3)}`);
            }

            const invalid = report.matches.filter((m) => m.status === 'invalid');
            if (invalid.length > 0) {
                console.log('\n  Skipped studies:');
                for (const match of invalid) {
                    console.log(`    ${match.studyId}: ${match.reason ?? 'invalid'}`);
                }
            }

            console.log('');
        } catch (error) {
            logger.error({ error }, 'Evaluation failed');
            process.exit(1);
        }
    });

program.parseAsync().catch((error: unknown) => {
    getLogger().error({ error }, 'Command failed');
    process.exit(1);
});
