import path from 'node:path';
import type { Writable } from 'node:stream';
import { Command, CommanderError, InvalidArgumentError } from 'commander';
import type { ActionEnv } from '../actions/env.js';
import type { VerifyState } from '../state/VerifyState.js';
import { StatusCode } from '../types/enums.js';
import { ManifestError, OperationAbortedError } from '../types/error.js';
import { DEFAULT_BACKUP_COUNT, DEFAULT_MANIFEST_NAME, MAX_BACKUP_COUNT } from '../config.js';
import { RunContext } from '../context/RunContext.js';
import { StatusWriter } from '../output/StatusWriter.js';
import { XmlManifestStore } from '../manifest/xml/XmlManifestStore.js';
import { findManifest } from '../manifest/discover.js';
import { rotateBackups } from '../manifest/backup.js';
import { SqliteVerifyState } from '../state/sqlite/SqliteVerifyState.js';
import { createCollection } from '../actions/init.js';
import { addAction, checkAction, updateAction, verifyAction } from '../actions/reconcile.js';
import { deleteAction, moveAction, renameAction } from '../actions/structure.js';
import { checkMetaAction, metaReportAction, updateMetaAction } from '../actions/meta.js';
import { exportAction, findDescAction, findPathAction, findTagAction } from '../actions/query.js';
import { describeFsError, lstatOrNull } from '../utils/fs.js';

export const EXIT_OK = 0;
export const EXIT_FAILED = 1;
export const EXIT_FATAL = 2;
export const EXIT_INTERRUPTED = 130;

export interface CliIo {
  stdout: Writable;
  stderr: Writable;
  cwd: string;
  signal?: AbortSignal;
  /** Called with the run context once options are parsed, e.g. to hook up a verbosity signal. */
  onContext?: (ctx: RunContext) => void;
}

interface GlobalOptions {
  chdir?: string;
  file: string;
  root?: string;
  verbose: boolean;
  walk: boolean;
  recurse: boolean;
  backup: number;
  exportdir?: string;
}

interface LoadedEnv extends ActionEnv {
  exportDir: string;
}

type Task = (env: LoadedEnv) => Promise<boolean>;

function parseBackup(value: string): number {
  const count = Number.parseInt(value, 10);
  if (!/^[0-9]+$/.test(value) || count > MAX_BACKUP_COUNT) {
    throw new InvalidArgumentError(`Expected a number from 0 to ${MAX_BACKUP_COUNT}.`);
  }
  return count;
}

export function createProgram(io: CliIo, setExitCode: (code: number) => void): Command {
  const store = new XmlManifestStore();
  const program = new Command();

  program
    .name('treeledger')
    .description('Track a directory tree in a manifest and report drift')
    .enablePositionalOptions()
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout.write(text),
      writeErr: (text) => io.stderr.write(text)
    })
    .option('-C, --chdir <dir>', 'change to this directory first')
    .option('-f, --file <name>', 'manifest file name', DEFAULT_MANIFEST_NAME)
    .option('-r, --root <dir>', 'collection root (relative to the manifest for init)')
    .option('-v, --verbose', 'verbose output', false)
    .option('-w, --walk', 'search parent directories for the manifest', false)
    .option('-x, --no-recurse', 'do not descend into subdirectories')
    .option('-b, --backup <count>', `manifest backups to keep (0-${MAX_BACKUP_COUNT})`, parseBackup, DEFAULT_BACKUP_COUNT)
    .option('-e, --exportdir <dir>', 'directory for backups and exported files');

  const globals = () => program.opts<GlobalOptions>();
  const workDir = (opts: GlobalOptions) => (opts.chdir ? path.resolve(io.cwd, opts.chdir) : io.cwd);

  const newContext = (opts: GlobalOptions) => {
    const ctx = new RunContext({ verbose: opts.verbose, recurse: opts.recurse, signal: io.signal });
    io.onContext?.(ctx);
    return ctx;
  };

  const guarded = async (sink: StatusWriter, body: () => Promise<number>): Promise<void> => {
    try {
      setExitCode(await body());
    } catch (err) {
      if (err instanceof OperationAbortedError) {
        io.stderr.write(`${err.message}\n`);
        setExitCode(EXIT_INTERRUPTED);
      } else if (err instanceof ManifestError) {
        sink.onError({ code: StatusCode.NOTMANIFEST, path: err.file, message: err.message });
        setExitCode(EXIT_FAILED);
      } else {
        sink.onError({ code: StatusCode.FATAL, path: '', message: describeFsError(err) });
        setExitCode(EXIT_FATAL);
      }
    }
  };

  /** Load the manifest, run the task and save the collection when it changed. */
  const withCollection = (task: Task) => {
    const opts = globals();
    const sink = new StatusWriter(io.stdout, io.stderr);
    return guarded(sink, async () => {
      const cwd = workDir(opts);
      const ctx = newContext(opts);
      if (opts.chdir && ctx.verbose()) sink.onStatus({ code: StatusCode.CHDIR, path: cwd });

      const file = await findManifest(opts.file, { cwd, walk: opts.walk });
      if (!file) {
        sink.onError({ code: StatusCode.NOFILE, path: opts.file, message: 'Collection not found' });
        return EXIT_FAILED;
      }
      if (ctx.verbose()) sink.onStatus({ code: StatusCode.COLLECTION, path: file });

      const collection = await store.read(file);
      if (!collection) throw new ManifestError(file, 'Manifest disappeared while loading');
      if (opts.root) collection.setRoot(path.resolve(cwd, opts.root));
      if (ctx.verbose()) sink.onStatus({ code: StatusCode.ROOT, path: collection.root });

      const exportDir = opts.exportdir ? path.resolve(cwd, opts.exportdir) : path.dirname(file);
      if (ctx.verbose()) sink.onStatus({ code: StatusCode.EXPORT, path: exportDir });

      if (!(await task({ collection, ctx, sink, cwd, exportDir }))) return EXIT_FAILED;

      if (collection.dirty) {
        await rotateBackups(file, exportDir, opts.backup);
        await store.save(collection, file);
      }
      return EXIT_OK;
    });
  };

  const withState = async (stateFile: string | undefined, env: LoadedEnv, run: (state?: VerifyState) => Promise<boolean>) => {
    if (!stateFile) return run();
    const state = new SqliteVerifyState({ path: path.resolve(env.cwd, stateFile) });
    try {
      return await run(state);
    } finally {
      state.close();
    }
  };

  program
    .command('init')
    .description('create an empty manifest in the working directory')
    .action(() => {
      const opts = globals();
      const sink = new StatusWriter(io.stdout, io.stderr);
      return guarded(sink, async () => {
        const file = path.resolve(workDir(opts), opts.file);
        if (await lstatOrNull(file)) {
          sink.onError({ code: StatusCode.EXISTS, path: file });
          return EXIT_FAILED;
        }
        sink.onStatus({ code: StatusCode.INIT, path: file });
        const collection = createCollection({
          manifestDir: path.dirname(file),
          manifestName: path.basename(file),
          autoRoot: opts.root
        });
        await store.save(collection, file);
        return EXIT_OK;
      });
    });

  program
    .command('check')
    .description('compare sizes and timestamps against the manifest')
    .argument('[path]', 'path to check', '.')
    .action((target: string) => withCollection((env) => checkAction(env, { path: target })));

  program
    .command('verify')
    .description('check, and also compare content checksums')
    .argument('[path]', 'path to verify', '.')
    .option('-s, --state <file>', 'remember verified files here and skip them on the next run')
    .action((target: string, options: { state?: string }) =>
      withCollection((env) => withState(options.state, env, (state) => verifyAction(env, { path: target, state })))
    );

  program
    .command('update')
    .description('record the current state of the tree')
    .argument('[path]', 'path to update', '.')
    .option('-f, --force', 'recompute every checksum', false)
    .action((target: string, options: { force: boolean }) =>
      withCollection((env) => updateAction(env, { path: target, force: options.force }))
    );

  program
    .command('add')
    .description('start tracking a filesystem entry')
    .argument('<path>', 'entry to add')
    .option('-p, --parents', 'also add missing parent directories', false)
    .action((target: string, options: { parents: boolean }) =>
      withCollection((env) => addAction(env, target, { parents: options.parents }))
    );

  program
    .command('move')
    .description('move a node to a new parent directory')
    .argument('<path>', 'node to move')
    .argument('<parent>', 'new parent directory')
    .action((target: string, parent: string) => withCollection(async (env) => moveAction(env, target, parent)));

  program
    .command('rename')
    .description('rename a node')
    .argument('<path>', 'node to rename')
    .argument('<name>', 'new name')
    .action((target: string, name: string) => withCollection(async (env) => renameAction(env, target, name)));

  program
    .command('delete')
    .description('stop tracking a node')
    .argument('<path>', 'node to delete')
    .action((target: string) => withCollection(async (env) => deleteAction(env, target)));

  program
    .command('updatemeta')
    .description('rebuild metadata from rule files')
    .action(() => withCollection((env) => updateMetaAction(env)));

  program
    .command('checkmeta')
    .description('check that every dependency is provided')
    .action(() => withCollection(async (env) => checkMetaAction(env)));

  program
    .command('metareport')
    .description('list the metadata of every node')
    .option('-a, --all', 'list the nodes satisfying each dependency', false)
    .option('-t, --type <letters>', '(a)ll, (d)escription, (t)ags, (p)rovides, d(e)pends, (o)ther', 'a')
    .action((options: { all: boolean; type: string }) =>
      withCollection(async (env) => metaReportAction(env, { all: options.all, types: options.type }))
    );

  program
    .command('export')
    .description('write md5sums.txt and info.txt')
    .action(() => withCollection((env) => exportAction(env, env.exportDir)));

  program
    .command('findtag')
    .description('find nodes by tag')
    .argument('<tags...>', 'tags to find')
    .option('-a, --all', 'require every tag', false)
    .option('-p, --path <path>', 'subtree to search', '.')
    .action((tags: string[], options: { all: boolean; path: string }) =>
      withCollection(async (env) => findTagAction(env, tags, { all: options.all, path: options.path }))
    );

  program
    .command('finddesc')
    .description('find nodes by description text')
    .argument('<descs...>', 'text to find')
    .option('-a, --all', 'require every text', false)
    .option('-p, --path <path>', 'subtree to search', '.')
    .action((descs: string[], options: { all: boolean; path: string }) =>
      withCollection(async (env) => findDescAction(env, descs, { all: options.all, path: options.path }))
    );

  program
    .command('findpath')
    .description('find nodes by path glob, or by regular expression with an r: prefix')
    .argument('<pattern>', 'pattern to match against /pretty/paths')
    .option('-c, --no-case', 'case insensitive')
    .option('-p, --path <path>', 'subtree to search', '.')
    .action((pattern: string, options: { case: boolean; path: string }) =>
      withCollection(async (env) => findPathAction(env, pattern, { ignoreCase: !options.case, path: options.path }))
    );

  return program;
}

/** Run one command line and return the process exit code. */
export async function runCli(argv: string[], io: CliIo): Promise<number> {
  let exitCode = EXIT_OK;
  const program = createProgram(io, (code) => {
    exitCode = code;
  });
  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;
    throw err;
  }
  return exitCode;
}
