import dotenv from 'dotenv';

dotenv.config();

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface Config {
    database: {
        path: string;
        busyTimeoutMs: number;
    };
    uploads: {
        folder: string;
    };
    services: {
        variantValidatorUrl: string;
        eutilsUrl: string;
        entrezEmail?: string;
        ncbiApiKey?: string;
        throttleMs: number;
        requestTimeoutMs: number;
    };
    logging: {
        level: LogLevel;
        file?: string;
    };
}

function parseLogLevel(value: string | undefined): LogLevel {
    const level = value?.toLowerCase();
    switch (level) {
        case 'debug':
        case 'info':
        case 'warn':
        case 'error':
            return level;
        default:
            return 'info';
    }
}

export const config: Config = {
    database: {
        path: process.env.DATABASE_PATH || './data/variants.db',
        busyTimeoutMs: parseInt(process.env.DB_BUSY_TIMEOUT_MS || '5000'),
    },
    uploads: {
        folder: process.env.UPLOAD_FOLDER || './uploads',
    },
    services: {
        variantValidatorUrl: process.env.VARIANT_VALIDATOR_URL || 'https://rest.variantvalidator.org',
        eutilsUrl: process.env.EUTILS_URL || 'https://eutils.ncbi.nlm.nih.gov/entrez/eutils',
        entrezEmail: process.env.ENTREZ_EMAIL || undefined,
        ncbiApiKey: process.env.NCBI_API_KEY || undefined,
        throttleMs: parseInt(process.env.API_THROTTLE_MS || '350'),
        requestTimeoutMs: parseInt(process.env.API_TIMEOUT_MS || '15000'),
    },
    logging: {
        level: parseLogLevel(process.env.LOG_LEVEL),
        file: process.env.LOG_FILE || undefined,
    },
};
