import * as joi from 'joi';
import { LogLevel, LOG_LEVELS } from '../utils/logger.js';

interface EnvVars {
    INVOICES_DIR: string;
    WORKBOOK_PATH: string;
    LOG_FILE: string;
    LOG_LEVEL: LogLevel;
    DEBUG_TEXT_DIR?: string;
}

const envSchema = joi
    .object<EnvVars>({
        INVOICES_DIR: joi.string().default('invoices'),
        WORKBOOK_PATH: joi.string().default('data/invoices.db'),
        LOG_FILE: joi.string().default('log.txt'),
        LOG_LEVEL: joi.string().valid(...LOG_LEVELS).default('info'),
        DEBUG_TEXT_DIR: joi.string().optional(),
    })
    .unknown(true);

export interface LedgerConfig {
    invoicesDir: string;
    workbookPath: string;
    logFile: string;
    logLevel: LogLevel;
    debugTextDir?: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): LedgerConfig {
    const { error, value } = envSchema.validate(env);

    if (error) {
        throw new Error(`Config validation error: ${error.message}`);
    }

    return {
        invoicesDir: value.INVOICES_DIR,
        workbookPath: value.WORKBOOK_PATH,
        logFile: value.LOG_FILE,
        logLevel: value.LOG_LEVEL,
        debugTextDir: value.DEBUG_TEXT_DIR,
    };
}
