import fs from 'node:fs';
import path from 'node:path';
import { inspect } from 'node:util';
import vm from 'node:vm';

import type { OperationsConfig } from '../config.js';
import type { OperationApi } from '../harness/operation-api.js';
import type { ConfigSource, UserConfigData } from '../scope/config-source.js';
import type { SearchPathChange } from '../scope/guards.js';
import type { SearchPath } from '../scope/search-path.js';
import type { LogCallback, TextSink } from '../types.js';

import * as helpers from '../fs-helpers.js';
import { Project } from '../harness/project.js';
import { RunRecord } from '../harness/run-record.js';
import { LogCapture, StderrCapture, TempFile } from '../scope/captures.js';
import { Chdir, Env, SearchPathGuard, UserConfig } from '../scope/guards.js';
import { within } from '../scope/scope-stack.js';

export interface NamespaceDeps {
  out: TextSink;
  api: OperationApi;
  operations: OperationsConfig;
  searchPath: SearchPath;
  userConfig: ConfigSource;
  testsDir: string;
  log?: LogCallback;
}

export function formatPrintArgs(args: readonly unknown[]): string {
  return args.map((arg) => (typeof arg === 'string' ? arg : inspect(arg))).join(' ');
}

/** Console whose log levels print into the example output; warnings and errors go to stderr. */
function transcriptConsole(print: (...args: unknown[]) => void): Pick<Console, 'log' | 'info' | 'debug' | 'warn' | 'error' | 'dir'> {
  const toStderr = (...args: unknown[]): void => { process.stderr.write(`${formatPrintArgs(args)}\n`); };
  return {
    log: print,
    info: print,
    debug: print,
    dir: (value: unknown) => { print(inspect(value)); },
    warn: toStderr,
    error: toStderr,
  };
}

/**
 * The globals every transcript file starts with. Classes that need the
 * runner's collaborators are handed out already bound to them.
 */
export function namespaceEntries(deps: NamespaceDeps): Record<string, unknown> {
  const { out, searchPath, userConfig, testsDir } = deps;
  const print = (...args: unknown[]): void => { out.write(`${formatPrintArgs(args)}\n`); };
  const printText = (text: string): void => { out.write(text); };

  class BoundProject extends Project {
    constructor(cwd: string, home?: string) {
      super(cwd, home, {
        api: deps.api,
        operations: deps.operations,
        searchPath,
        userConfig,
        print: printText,
        log: deps.log,
      });
    }
  }

  class BoundStderrCapture extends StderrCapture {
    constructor() {
      super(out);
    }
  }

  class BoundLogCapture extends LogCapture {
    constructor() {
      super(out);
    }
  }

  class BoundUserConfig extends UserConfig {
    constructor(data: UserConfigData) {
      super(userConfig, data);
    }
  }

  class BoundSearchPath extends SearchPathGuard {
    constructor(change: SearchPathChange | readonly string[]) {
      super(searchPath, change);
    }
  }

  return {
    Project: BoundProject,
    RunRecord,
    Chdir,
    Env,
    SearchPath: BoundSearchPath,
    UserConfig: BoundUserConfig,
    StderrCapture: BoundStderrCapture,
    LogCapture: BoundLogCapture,
    TempFile,
    within,
    print,
    console: transcriptConsole(print),
    pprint: (value: unknown) => { out.write(`${inspect(value, { sorted: true, depth: null })}\n`); },
    load: (request: string) => searchPath.load(request, process.cwd()),
    cat: (...parts: string[]) => { helpers.cat(printText, ...parts); },
    find: (root: string, opts?: helpers.FindOptions) => { helpers.find(root, printText, opts); },
    findPaths: helpers.findPaths,
    dir: helpers.dir,
    write: helpers.write,
    touch: helpers.touch,
    mkdir: (target: string) => { fs.mkdirSync(target); },
    mkdtemp: helpers.mkdtemp,
    mktempHome: helpers.mktempHome,
    initHome: helpers.initHome,
    sample: (...parts: string[]) => helpers.sample(testsDir, ...parts),
    samplesDir: () => helpers.samplesDir(testsDir),
    sha256: helpers.sha256,
    sleep: helpers.sleep,
    symlink: (target: string, link: string) => { fs.symlinkSync(target, link); },
    copytree: helpers.copytree,
    comparePaths: helpers.comparePaths,
    abspath: (p: string) => path.resolve(p),
    basename: (p: string) => path.basename(p),
    dirname: (p: string) => path.dirname(p),
    exists: (p: string) => fs.existsSync(p),
    joinPath: (...parts: string[]) => path.join(...parts),
    path: (...parts: string[]) => path.join(...parts),
    realpath: (p: string) => fs.realpathSync(p),
    relpath: (p: string, start: string = process.cwd()) => path.relative(start, p),
    userConfig,
    searchPath,
    process,
    Buffer,
    setTimeout,
    clearTimeout,
    setImmediate,
  };
}

/** A fresh evaluation context for one transcript file. */
export function buildNamespace(deps: NamespaceDeps): vm.Context {
  return vm.createContext(namespaceEntries(deps));
}
