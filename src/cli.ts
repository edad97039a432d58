#!/usr/bin/env node
import 'dotenv/config';
import chalk from 'chalk';
import { loadConfig } from './config/index.js';
import { openLedger, processFolder, shutdown } from './index.js';
import { BatchSummary, DocumentResult } from './types/output.js';
import { createErrorLedger, createLogger } from './utils/logger.js';

const DIVIDER = '='.repeat(60);

function describe(result: DocumentResult): string {
    if (result.invoice) {
        const { invoiceNumber, poNumber, department, grandTotal } = result.invoice;
        return `invoice ${invoiceNumber || '(no number)'} -> PO ${poNumber || '-'} (${department}), total ${grandTotal.toFixed(2)}`;
    }
    if (result.purchaseOrder) {
        return `PO ${result.purchaseOrder.poNumber}, ${result.purchaseOrder.department}`;
    }
    return result.error?.message ?? result.outcome;
}

function printSummary(summary: BatchSummary, workbookPath: string, logFile: string) {
    console.log('\n' + chalk.cyan(DIVIDER));
    console.log(chalk.cyan.bold('  PROCESSING SUMMARY'));
    console.log(chalk.cyan(DIVIDER));

    summary.results.forEach(result => {
        const badge = result.outcome === 'inserted'
            ? chalk.green('[INSERTED]')
            : result.outcome === 'skipped_duplicate'
                ? chalk.yellow('[DUPLICATE]')
                : chalk.red(`[${result.outcome.toUpperCase()}]`);
        console.log(`  ${badge} ${chalk.white(result.filename)} ${chalk.gray(describe(result))}`);
    });

    console.log('');
    Object.entries(summary.counts)
        .filter(([, count]) => count > 0)
        .forEach(([outcome, count]) => console.log(chalk.white(`  ${outcome}: ${count}`)));

    console.log(chalk.cyan(DIVIDER));
    console.log(summary.saved ? chalk.green(`Results saved to: ${workbookPath}`) : chalk.red('Workbook was not saved'));
    console.log(chalk.gray(`Logs saved to: ${logFile}`));
}

async function main() {
    const config = loadConfig();
    const folder = process.argv[2] ?? config.invoicesDir;

    console.log(chalk.cyan(DIVIDER));
    console.log(chalk.cyan.bold('  Invoice and PO Processing'));
    console.log(chalk.cyan(DIVIDER));

    const session = await openLedger({
        workbookPath: config.workbookPath,
        logger: createLogger({ level: config.logLevel, logFile: config.logFile }),
        ledger: createErrorLedger(config.logFile),
        debugTextDir: config.debugTextDir,
    });

    try {
        const summary = await processFolder(session, folder);
        printSummary(summary, config.workbookPath, config.logFile);
        if (!summary.saved && summary.results.length > 0) {
            process.exitCode = 1;
        }
    } finally {
        shutdown(session);
    }
}

main().catch(err => {
    console.error(chalk.red('Processing failed:'), err);
    process.exit(1);
});
