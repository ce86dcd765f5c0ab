#!/usr/bin/env node

import * as fs from 'node:fs';
import * as path from 'node:path';
import { globby } from 'globby';
import { ConfigError, loadConfig, type RbsigConfig } from './core/config.js';
import { EditConflictError } from './core/edits.js';
import { toJsonResult, textReport, type OutputFormat } from './core/format.js';
import { lintRuby } from './core/pipeline.js';
import { isRuleName, RULE_NAMES, type Diagnostic, type LineBudget, type RuleName } from './core/types.js';
import { fixRuby } from './index.js';

class UsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'UsageError';
    }
}

function printUsage() {
    console.log('Usage: rbsig [options] <file|directory>...');
    console.log('       cat file.rb | rbsig -');
    console.log('  - Checks that Ruby methods carry Sorbet signatures and that signatures sit');
    console.log('    directly above their methods');
    console.log('  - When a directory is given, scans recursively for .rb/.rake/.gemspec/.ru files');
    console.log('Options:');
    console.log('  --fix               Apply corrections (multi-pass until stable)');
    console.log('  --dry-run, -n       Do not write files (useful with --fix)');
    console.log('  --print-fixed       With --fix, print fixed content for a single file/stdin');
    console.log('  --format, -f        Output format: text|json (default: text)');
    console.log(`  --only <rules>      Comma-separated rules to run: ${RULE_NAMES.join(', ')}`);
    console.log('  --line-length <n>   Line length limit for synthesized signatures (or "none")');
    console.log('  --config, -c        Path to a config file (default: ./.rbsig.json when present)');
    console.log('  --include, -I       Glob(s) to include (repeatable or comma-separated)');
    console.log('  --exclude, -E       Glob(s) to exclude (repeatable or comma-separated)');
    console.log('  --no-gitignore      Do not respect .gitignore when scanning directories');
}

interface CliOptions {
    format: OutputFormat;
    fix: boolean;
    dryRun: boolean;
    printFixed: boolean;
    only?: RuleName[];
    lineLength?: LineBudget;
    configPath?: string;
    includeGlobs: string[];
    excludeGlobs: string[];
    useGitignore: boolean;
    targets: string[];
}

function splitList(value: string): string[] {
    return value.split(',').map(s => s.trim()).filter(Boolean);
}

function requireValue(args: string[], i: number, flag: string): string {
    const v = args[i + 1];
    if (v === undefined) throw new UsageError(`Missing value for ${flag}`);
    return v;
}

function parseArgs(args: string[]): CliOptions {
    const opts: CliOptions = {
        format: 'text',
        fix: false,
        dryRun: false,
        printFixed: false,
        includeGlobs: [],
        excludeGlobs: [],
        useGitignore: true,
        targets: [],
    };
    for (let i = 0; i < args.length; i++) {
        const a = args[i] ?? '';
        if (a === '--format' || a === '-f') {
            const v = requireValue(args, i, a).toLowerCase();
            if (v !== 'json' && v !== 'text') throw new UsageError(`Unknown format: ${v}`);
            opts.format = v;
            i++; continue;
        }
        if (a === '--fix') { opts.fix = true; continue; }
        if (a === '--dry-run' || a === '-n') { opts.dryRun = true; continue; }
        if (a === '--print-fixed') { opts.printFixed = true; continue; }
        if (a === '--only') {
            const names = splitList(requireValue(args, i, a));
            const unknown = names.filter(n => !isRuleName(n));
            if (unknown.length > 0) throw new UsageError(`Unknown rule(s): ${unknown.join(', ')}`);
            opts.only = names.filter(isRuleName);
            i++; continue;
        }
        if (a === '--line-length') {
            const v = requireValue(args, i, a);
            const n = Number(v);
            if (v === 'none') opts.lineLength = null;
            else if (Number.isInteger(n) && n > 0) opts.lineLength = n;
            else throw new UsageError(`Invalid line length: ${v}`);
            i++; continue;
        }
        if (a === '--config' || a === '-c') {
            opts.configPath = requireValue(args, i, a);
            i++; continue;
        }
        if (a === '--include' || a === '-I') {
            opts.includeGlobs.push(...splitList(requireValue(args, i, a)));
            i++; continue;
        }
        if (a === '--exclude' || a === '-E') {
            opts.excludeGlobs.push(...splitList(requireValue(args, i, a)));
            i++; continue;
        }
        if (a === '--no-gitignore') { opts.useGitignore = false; continue; }
        if (a === '--gitignore') { opts.useGitignore = true; continue; }
        if (a === '-' || !a.startsWith('-')) { opts.targets.push(a); continue; }
        throw new UsageError(`Unknown option: ${a}`);
    }
    return opts;
}

function isDirectory(p: string) {
    return fs.existsSync(p) && fs.statSync(p).isDirectory();
}

const DEFAULT_INCLUDE_GLOBS = [
  '**/*.rb',
  '**/*.rake',
  '**/*.gemspec',
  '**/*.ru',
];

const DEFAULT_IGNORE_DIRS = [
  '**/.git/**',
  '**/node_modules/**',
  '**/vendor/bundle/**',
  '**/tmp/**',
  '**/log/**',
  '**/coverage/**'
];

async function listCandidateFiles(root: string, includes: string[], excludes: string[], useGitignore: boolean): Promise<string[]> {
    const patterns = includes.length > 0 ? includes : DEFAULT_INCLUDE_GLOBS;
    const ignore = [
      ...excludes,
      ...(useGitignore ? [] : DEFAULT_IGNORE_DIRS),
    ];
    const cwdAbs = path.resolve(root);
    const files = await globby(patterns, {
      cwd: cwdAbs,
      absolute: true,
      dot: true,
      gitignore: useGitignore,
      ignore,
      followSymbolicLinks: false,
    });
    return files.sort();
}

type FileResult = { file: string; content: string; diagnostics: Diagnostic[] };

function checkFile(file: string, content: string, opts: CliOptions, config: RbsigConfig): FileResult {
    const stdin = file === '<stdin>';
    const lintOptions = {
        filename: stdin ? undefined : file,
        config,
        only: opts.only,
        lineLengthLimit: opts.lineLength,
    };
    if (!opts.fix) {
        return { file, content, diagnostics: lintRuby(content, lintOptions).diagnostics };
    }
    try {
        const { fixed, diagnostics } = fixRuby(content, lintOptions);
        if (fixed !== content && !opts.dryRun && !stdin) fs.writeFileSync(file, fixed, 'utf8');
        if (opts.printFixed || stdin) process.stdout.write(fixed);
        return { file, content: fixed, diagnostics };
    } catch (e) {
        if (!(e instanceof EditConflictError)) throw e;
        return { file, content, diagnostics: [{ line: 1, column: 1, severity: 'error', code: 'RB-FIX-CONFLICT', message: e.message }] };
    }
}

async function collectTargets(opts: CliOptions): Promise<string[]> {
    const files: string[] = [];
    for (const target of opts.targets) {
        if (target === '-') { files.push(target); continue; }
        if (isDirectory(target)) {
            files.push(...await listCandidateFiles(target, opts.includeGlobs, opts.excludeGlobs, opts.useGitignore));
            continue;
        }
        if (!fs.existsSync(target)) throw new UsageError(`File not found: ${target}`);
        files.push(target);
    }
    return files;
}

async function main(): Promise<number> {
    const args = process.argv.slice(2);
    if (args.length === 0 || args[0] === '-h' || args[0] === '--help') {
        printUsage();
        return args.length === 0 ? 2 : 0;
    }

    let opts: CliOptions;
    let config: RbsigConfig;
    let files: string[];
    try {
        opts = parseArgs(args);
        if (opts.targets.length === 0) throw new UsageError('No input given');
        config = loadConfig(opts.configPath);
        files = await collectTargets(opts);
    } catch (e) {
        if (e instanceof UsageError || e instanceof ConfigError) {
            console.error(e.message);
            return 2;
        }
        throw e;
    }

    const results: FileResult[] = [];
    for (const file of files) {
        const stdin = file === '-';
        const content = fs.readFileSync(stdin ? 0 : file, 'utf8');
        results.push(checkFile(stdin ? '<stdin>' : file, content, opts, config));
    }

    const dirty = results.filter(r => r.diagnostics.length > 0);
    if (opts.format === 'json') {
        const jsonFiles = results.map(r => toJsonResult(r.file, r.diagnostics));
        const errorCount = jsonFiles.reduce((n, jf) => n + jf.errorCount, 0);
        const warningCount = jsonFiles.reduce((n, jf) => n + jf.warningCount, 0);
        const payload = { valid: dirty.length === 0, files: jsonFiles, errorCount, warningCount };
        console.log(JSON.stringify(payload, null, 2));
        return dirty.length === 0 ? 0 : 1;
    }

    if (dirty.length === 0) {
        // stdout may carry fixed content
        if (!(opts.fix && (opts.printFixed || files.includes('-')))) {
            console.log(files.length === 0 ? 'No Ruby files found.' : `${files.length} file(s) inspected, no offenses.`);
        }
        return 0;
    }
    for (const r of dirty) {
        console.error(textReport(r.file, r.content, r.diagnostics).trimEnd());
    }
    return 1;
}

main().then(
    (code) => { process.exitCode = code; },
    (err: unknown) => {
        console.error(err instanceof Error ? (err.stack ?? err.message) : String(err));
        process.exitCode = 1;
    },
);
