#!/usr/bin/env node
import 'dotenv/config';
import { readFile } from 'fs/promises';
import chalk from 'chalk';
import { loadConfig } from './config.js';
import { loadOntology } from './ontology/index.js';
import type { Ontology } from './ontology/index.js';
import { classifyOutput, isReasonerName } from './reasoners/status.js';
import { LogicException } from './types/errors.js';
import type { LogLevel, OutputFormat } from './types/options.js';
import { setLogLevel } from './utils/logger.js';

const VERSION = '1.0.0';
const HELP = `
CLIF Translate v${VERSION}

Usage:
  clif-translate tptp <file.clif>                   Print one fof(...) line per axiom
  clif-translate ladr <file.clif>                   Print one LADR line per axiom
  clif-translate translate <file.clif>              Use the format from CLIF_FORMAT
  clif-translate validate <file.clif>               Check syntax only
  clif-translate classify <reasoner> <output-file>  Read a reasoner's output status

Options:
  --ffpcnf, -p          Convert axioms to function-free prenex CNF first
  --log-level=<level>   silent, error, warn, info or debug
  --help, -h            Show this help
  --version, -v         Show version

Environment:
  CLIF_FORMAT, CLIF_FFPCNF, CLIF_LOG_LEVEL (also read from .env)

Examples:
  clif-translate tptp --ffpcnf theory.clif
  clif-translate classify vampire theory.vampire.out
`;

const LOG_LEVELS: readonly LogLevel[] = ['silent', 'error', 'warn', 'info', 'debug'];

function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some(level => level === value);
}

/**
 * Run the command line. Returns the process exit code.
 */
export async function runCli(args: string[]): Promise<number> {
    if (args.includes('--help') || args.includes('-h') || args.length === 0) {
        console.log(HELP);
        return 0;
    }

    if (args.includes('--version') || args.includes('-v')) {
        console.log(VERSION);
        return 0;
    }

    const config = loadConfig();
    let logLevel = config.logLevel;
    const ffpcnf = config.ffpcnf || args.includes('--ffpcnf') || args.includes('-p');
    const cleanArgs: string[] = [];

    for (const arg of args) {
        if (arg.startsWith('--log-level=')) {
            const level = arg.split('=')[1];
            if (!isLogLevel(level)) {
                console.error(chalk.red(`Error: Invalid log level '${level}'. Valid options are: ${LOG_LEVELS.join(', ')}`));
                return 1;
            }
            logLevel = level;
        } else if (!arg.startsWith('-')) {
            cleanArgs.push(arg);
        }
    }
    setLogLevel(logLevel);

    const [commandName, ...operands] = cleanArgs;

    switch (commandName) {
        case 'tptp':
        case 'ladr':
        case 'translate': {
            const format: OutputFormat = commandName === 'translate' ? config.format : commandName;
            return translate(operands[0], format, ffpcnf);
        }
        case 'validate':
            return validate(operands[0]);
        case 'classify':
            return classify(operands[0], operands[1]);
        default:
            console.error(chalk.red(`Unknown command: ${commandName}`));
            console.log(HELP);
            return 1;
    }
}

async function translate(file: string | undefined, format: OutputFormat, ffpcnf: boolean): Promise<number> {
    if (!file) {
        console.error(chalk.red('Error: file argument required'));
        return 1;
    }

    const ontology = await loadOntology(file);
    if (ontology === null) {
        return 0;
    }

    for (const line of ontology.serialize(format, { ffpcnf })) {
        console.log(line);
    }
    return 0;
}

async function validate(file: string | undefined): Promise<number> {
    if (!file) {
        console.error(chalk.red('Error: file argument required'));
        return 1;
    }

    let ontology: Ontology | null;
    try {
        ontology = await loadOntology(file);
    } catch (error) {
        if (error instanceof LogicException && error.code === 'GRAMMAR_ERROR') {
            console.log(chalk.red(`✗ ${file}`));
            report(error);
            return 1;
        }
        throw error;
    }

    if (ontology === null) {
        console.log(chalk.yellow(`- ${file}: nothing to parse`));
        return 0;
    }

    const { axiomCount, imports, diagnostics } = ontology.info();
    console.log(chalk.green(`✓ ${file}: ${axiomCount} axioms, ${imports.length} imports`));
    for (const diagnostic of diagnostics) {
        console.log(chalk.yellow(`  ${diagnostic.message}`));
    }
    return diagnostics.length > 0 ? 1 : 0;
}

async function classify(reasoner: string | undefined, outputFile: string | undefined): Promise<number> {
    if (!reasoner || !outputFile) {
        console.error(chalk.red('Error: reasoner and output file required'));
        return 1;
    }
    if (!isReasonerName(reasoner)) {
        console.error(chalk.yellow(`Warning: no output grammar for '${reasoner}'`));
    }

    console.log(classifyOutput(reasoner, await readFile(outputFile, 'utf-8')));
    return 0;
}

export function report(error: unknown): void {
    if (error instanceof LogicException) {
        console.error(chalk.red(error.message));
        if (error.error.context) console.error(`  in: ${error.error.context}`);
        if (error.error.suggestion) console.error(chalk.dim(`  hint: ${error.error.suggestion}`));
    } else {
        console.error(chalk.red('Failed:'), error);
    }
}

if (require.main === module) {
    runCli(process.argv.slice(2))
        .then(code => process.exit(code))
        .catch(error => {
            report(error);
            process.exit(1);
        });
}
