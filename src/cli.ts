#!/usr/bin/env node
/**
 * @module cli
 * @description Command-line interface: load a scene file and run it headless
 *
 * Usage:
 *   npx tsx src/cli.ts scenes/demo.txt
 *   npx tsx src/cli.ts scenes/demo.txt --ticks 500 --log-level debug
 *   npx tsx src/cli.ts scenes/demo.txt --jsonl logs/demo.jsonl --detection bounds
 */

import * as fs from 'fs';
import { pathToFileURL } from 'url';
import { ConsoleLogger, MultiLogger, type Logger, type LogLevel } from './core/logging';
import { JsonlFileLogger } from './core/logging-node';
import type { DetectionMode } from './models/agents/types';
import { Simulation } from './engine/simulation';
import { loadSceneFile } from './io/scene-file';

// ==================== Argument Parsing ====================

export interface CliArgs {
    sceneFile: string | null;
    ticks: number;
    logLevel: LogLevel;
    jsonl: string | null;
    detectionMode: DetectionMode;
    help: boolean;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some(level => level === value);
}

export function parseArgs(argv: string[]): CliArgs {
    const args: CliArgs = {
        sceneFile: null,
        ticks: 100,
        logLevel: 'info',
        jsonl: null,
        detectionMode: 'polygon',
        help: false,
    };

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];

        if (arg === '--help' || arg === '-h') {
            args.help = true;
        } else if (arg === '--ticks' || arg === '-t') {
            const ticks = parseInt(argv[++i] ?? '', 10);
            args.ticks = Number.isInteger(ticks) && ticks >= 0 ? ticks : 100;
        } else if (arg === '--log-level' || arg === '-l') {
            const level = argv[++i] ?? '';
            if (isLogLevel(level)) args.logLevel = level;
        } else if (arg === '--jsonl' || arg === '-j') {
            args.jsonl = argv[++i] ?? null;
        } else if (arg === '--detection' || arg === '-d') {
            args.detectionMode = argv[++i] === 'bounds' ? 'bounds' : 'polygon';
        } else if (!arg.startsWith('-') && args.sceneFile === null) {
            args.sceneFile = arg;
        }
    }

    return args;
}

function printHelp(): void {
    console.log(`
Arena robot simulation - headless runner

Usage:
  npx tsx src/cli.ts <scene-file> [options]

Options:
  -h, --help              Show this help message
  -t, --ticks N           Ticks to run (default: 100)
  -l, --log-level L       debug | info | warn | error (default: info)
  -j, --jsonl FILE        Also write JSONL logs to FILE
  -d, --detection MODE    polygon | bounds (default: polygon)
`);
}

// ==================== Main ====================

export function main(argv: string[] = process.argv.slice(2)): number {
    const args = parseArgs(argv);

    if (args.help || args.sceneFile === null) {
        printHelp();
        return args.help ? 0 : 1;
    }

    // MultiLogger keeps this array, so loggers pushed later still receive entries
    const loggers: Logger[] = [new ConsoleLogger(args.logLevel)];
    const logger = new MultiLogger(loggers);

    try {
        if (args.jsonl !== null) {
            loggers.push(new JsonlFileLogger({ run: 'cli', outputFile: args.jsonl }));
        }
        const simulation = new Simulation({ detectionMode: args.detectionMode }, logger);
        loadSceneFile(simulation, args.sceneFile);

        for (let i = 0; i < args.ticks; i++) {
            simulation.tick();
        }

        console.log('');
        for (const pose of simulation.poses()) {
            console.log(
                `${pose.id.padEnd(12)} ${pose.kind.padEnd(10)} ` +
                `x=${pose.x.toFixed(2)} y=${pose.y.toFixed(2)} heading=${pose.heading.toFixed(1)} ` +
                `${pose.isMoving ? 'moving' : 'stopped'}`
            );
        }
        simulation.close();
        return 0;
    } catch (error) {
        console.error('');
        console.error('[FAILED] Run failed:');
        console.error(`  ${error instanceof Error ? error.message : String(error)}`);
        console.error('');
        logger.close();
        return 1;
    }
}

/**
 * Whether `scriptPath` (usually `process.argv[1]`) names the module at `moduleUrl`
 *
 * Symlinks are resolved first: npm starts package bins through a link.
 */
export function isMainModule(scriptPath: string | undefined, moduleUrl: string): boolean {
    if (scriptPath === undefined || !fs.existsSync(scriptPath)) return false;
    return pathToFileURL(fs.realpathSync(scriptPath)).href === moduleUrl;
}

// Run if executed directly
if (isMainModule(process.argv[1], import.meta.url)) {
    process.exit(main());
}
