#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import path from 'path';
import { existsSync } from 'fs';
import { config } from '../config/index.js';
import { EnrichmentProgress } from '../annotation/enrichment-orchestrator.js';
import { HgvsResolver } from '../annotation/hgvs-resolver.js';
import { ClinVarClient } from '../clinvar/clinvar-client.js';
import { openSession, withSession } from '../db/client.js';
import {
    isSearchCategory,
    patientsForVariant,
    SEARCH_CATEGORIES,
    storeStatistics,
    variantsByClassification,
    variantsForGene,
    variantsForPatient,
} from '../db/variant-search.js';
import { describeError } from '../errors.js';
import { IngestionDriver, IngestionReport } from '../ingest/ingestion-driver.js';
import { IngestionProgress } from '../utils/progress.js';
import { StoredVariant } from '../variant/types.js';

const program = new Command();

function fail(label: string, error: unknown): never {
    console.error(chalk.red(`❌ ${label}:`), describeError(error));
    process.exit(1);
}

function printVariant(variant: StoredVariant, patient?: string): void {
    const header = patient ? `${variant.vcf_form} ${chalk.gray(`(${patient})`)}` : variant.vcf_form;
    console.log(chalk.green(header));
    console.log(chalk.gray(`  HGVS: ${variant.hgvs ?? 'N/A'} | Gene: ${variant.gene_symbol ?? 'N/A'}`));
    console.log(chalk.gray(`  Classification: ${variant.classification ?? 'N/A'} | Review: ${variant.review_status ?? 'N/A'}`));
    if (variant.clinvar_url) {
        console.log(chalk.gray(`  ClinVar: ${variant.clinvar_url}`));
    }
}

function printReport(report: IngestionReport): void {
    if (report.status === 'skipped') {
        console.log(chalk.yellow(`⏭️  ${report.patientName}: identical upload, nothing to do`));
        return;
    }
    if (report.status === 'failed') {
        console.log(chalk.red(`❌ ${report.patientName}: ${report.error ?? 'failed'}`));
        return;
    }
    console.log(chalk.green(`✅ ${report.patientName}: ${report.rowCount} variants stored`));
    if (report.enrichment) {
        const { hgvs, clinical, outboundCalls } = report.enrichment;
        console.log(chalk.gray(`  HGVS: ${hgvs.fetched} fetched, ${hgvs.cached} from store, ${hgvs.failed} failed`));
        console.log(
            chalk.gray(
                `  ClinVar: ${clinical.fetched} fetched, ${clinical.cached} from store, ${clinical.failed} failed, ${clinical.skipped} skipped`
            )
        );
        console.log(chalk.gray(`  External requests: ${outboundCalls}`));
    }
    if (report.write) {
        console.log(
            chalk.gray(
                `  New variants: ${report.write.variantsCreated} | Filled: ${report.write.variantsFilled} | Links: ${report.write.linksCreated}`
            )
        );
    }
}

function createDriver(database: string): { driver: IngestionDriver; progress: IngestionProgress } {
    const driver = new IngestionDriver({ databasePath: database });
    const progress = new IngestionProgress();

    driver.on('rows', ({ patientName, total }: { patientName: string; total: number }) => {
        progress.startFile(patientName, total);
    });
    driver.on('progress', (update: EnrichmentProgress) => {
        progress.update(update.processed, update.total, update.vcfForm);
    });
    driver.on('skipped', () => progress.complete('Already stored'));
    driver.on('complete', () => progress.complete());

    return { driver, progress };
}

program
    .name('varannot')
    .description('Patient variant ingestion with HGVS and ClinVar annotation')
    .version('1.0.0');

program
    .command('init-db')
    .description('Create the SQLite schema')
    .option('-d, --database <path>', 'SQLite database path', config.database.path)
    .action(async (options: { database: string }) => {
        try {
            await withSession({ path: options.database }, () => undefined);
            console.log(chalk.green(`✅ Database ready at ${options.database}`));
        } catch (error) {
            fail('Error', error);
        }
    });

program
    .command('ingest')
    .description('Ingest one patient variant file (.csv, .vcf or .tsv)')
    .argument('<file>', 'Variant file; the file name without extension is the patient name')
    .option('-d, --database <path>', 'SQLite database path', config.database.path)
    .action(async (file: string, options: { database: string }) => {
        const { driver, progress } = createDriver(options.database);
        try {
            if (!existsSync(file)) {
                throw new Error(`File not found: ${file}`);
            }

            console.log(chalk.blue(`🧬 Ingesting ${path.basename(file)}...`));
            const report = await driver.ingestFile(file);
            progress.stop();
            printReport(report);
        } catch (error) {
            progress.error(describeError(error));
            progress.stop();
            fail('Ingestion failed', error);
        }
    });

program
    .command('ingest-dir')
    .description('Ingest every variant file in a directory, one batch per file')
    .argument('[directory]', 'Directory to scan', config.uploads.folder)
    .option('-d, --database <path>', 'SQLite database path', config.database.path)
    .action(async (directory: string, options: { database: string }) => {
        const { driver, progress } = createDriver(options.database);
        try {
            if (!existsSync(directory)) {
                throw new Error(`Directory not found: ${directory}`);
            }

            console.log(chalk.blue(`📁 Ingesting files from ${directory}...`));
            const reports = await driver.ingestDirectory(directory);
            progress.stop();

            console.log('─'.repeat(50));
            reports.forEach(printReport);

            const failed = reports.filter(report => report.status === 'failed').length;
            console.log(chalk.blue(`📊 ${reports.length} files, ${failed} failed`));
            if (failed > 0) {
                process.exit(1);
            }
        } catch (error) {
            progress.stop();
            fail('Ingestion failed', error);
        }
    });

program
    .command('search')
    .description(`Search stored variants by ${SEARCH_CATEGORIES.join(', ')}`)
    .argument('<category>', `One of: ${SEARCH_CATEGORIES.join(', ')}`)
    .argument('<query>', 'Patient name, gene symbol, classification, or variant key / HGVS')
    .option('-d, --database <path>', 'SQLite database path', config.database.path)
    .action(async (category: string, query: string, options: { database: string }) => {
        try {
            if (!isSearchCategory(category)) {
                throw new Error(`Unknown search category '${category}'. Use one of: ${SEARCH_CATEGORIES.join(', ')}`);
            }

            const session = openSession({ path: options.database });
            try {
                switch (category) {
                    case 'patient': {
                        const variants = variantsForPatient(session, query);
                        console.log(chalk.blue(`📊 ${variants.length} variants for patient '${query}'`));
                        console.log('─'.repeat(80));
                        variants.forEach(variant => printVariant(variant));
                        break;
                    }
                    case 'gene': {
                        const variants = variantsForGene(session, query);
                        console.log(chalk.blue(`📊 ${variants.length} patient variants in ${query}`));
                        console.log('─'.repeat(80));
                        variants.forEach(variant => printVariant(variant, variant.patient_name));
                        break;
                    }
                    case 'classification': {
                        const variants = variantsByClassification(session, query);
                        console.log(chalk.blue(`📊 ${variants.length} variants classified '${query}'`));
                        console.log('─'.repeat(80));
                        variants.forEach(variant => printVariant(variant));
                        break;
                    }
                    case 'variant': {
                        const result = patientsForVariant(session, query);
                        if (!result) {
                            console.log(chalk.yellow(`Variant '${query}' not found`));
                            break;
                        }
                        printVariant(result.variant);
                        console.log(chalk.blue(`👥 Patients: ${result.patients.join(', ') || 'none'}`));
                        break;
                    }
                }
            } finally {
                session.close();
            }
        } catch (error) {
            fail('Search failed', error);
        }
    });

program
    .command('resolve-hgvs')
    .description('Resolve a CHROM:POS:REF:ALT key to MANE Select HGVS')
    .argument('<variant>', 'Variant key, e.g. 17:45983420:G:T')
    .action(async (variant: string) => {
        try {
            const resolution = await new HgvsResolver().resolve(variant);
            console.log(chalk.green(`${resolution.vcf_form} → ${resolution.hgvs}`));
            console.log(chalk.gray(`  Gene: ${resolution.gene_symbol}`));
            console.log(chalk.gray(`  HGNC: ${resolution.hgnc_id} | OMIM: ${resolution.omim_id}`));
        } catch (error) {
            fail('Lookup failed', error);
        }
    });

program
    .command('clinvar')
    .description('Fetch the ClinVar annotation for a transcript HGVS string')
    .argument('<hgvs>', 'Transcript HGVS, e.g. NM_001377265.1:c.841G>T')
    .action(async (hgvs: string) => {
        try {
            const annotation = await new ClinVarClient().fetchAnnotation(hgvs);
            console.log(chalk.blue(`🧬 ${hgvs}`));
            console.log('─'.repeat(70));
            console.log(chalk.green(`ClinVar ID: ${annotation.clinvar_id} (${annotation.clinvar_accession})`));
            console.log(chalk.gray(`Gene: ${annotation.gene_symbol} | cDNA: ${annotation.cdna_change}`));
            console.log(chalk.yellow(`Classification: ${annotation.classification}`));
            console.log(chalk.gray(`Review status: ${annotation.review_status} | Submissions: ${annotation.num_records}`));
            console.log(chalk.gray(`Condition: ${annotation.associated_condition}`));
            console.log(chalk.gray(`URL: ${annotation.clinvar_url}`));
        } catch (error) {
            fail('Lookup failed', error);
        }
    });

program
    .command('stats')
    .description('Show store statistics')
    .option('-d, --database <path>', 'SQLite database path', config.database.path)
    .action(async (options: { database: string }) => {
        try {
            const stats = await withSession({ path: options.database }, storeStatistics);
            console.log(chalk.blue('📊 Variant Store Statistics'));
            console.log('─'.repeat(50));
            console.log(chalk.green(`Patients: ${stats.patients.toLocaleString()}`));
            console.log(chalk.green(`Genes: ${stats.genes.toLocaleString()}`));
            console.log(chalk.green(`Variants: ${stats.variants.toLocaleString()}`));
            console.log(chalk.green(`Patient links: ${stats.links.toLocaleString()}`));
            if (!stats.fullyPopulated) {
                console.log(chalk.yellow('⚠️  Store is not fully populated. Run "ingest-dir" to load patient files.'));
            }
        } catch (error) {
            fail('Error', error);
        }
    });

program.parseAsync(process.argv).catch(error => fail('Error', error));
