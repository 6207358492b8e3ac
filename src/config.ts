import os from 'node:os';
import path from 'node:path';

import { z } from 'zod';

const CaptureScopeSchema = z.enum(['file', 'example']);

const LogFormatSchema = z.enum(['logfmt', 'json', 'console', 'none']);

const OperationsConfigSchema = z.object({
  command: z.array(z.string().min(1)).min(1).optional(),
  homeEnv: z.string().min(1).optional(),
  userConfigEnv: z.string().min(1).optional(),
  noWarnEnv: z.string().min(1).optional(),
  timeoutMs: z.number().int().positive().optional(),
}).strict();

const LoggingConfigSchema = z.object({
  format: LogFormatSchema.optional(),
  verbose: z.boolean().optional(),
  trace: z.boolean().optional(),
}).strict();

export const RunnerConfigLayerSchema = z.object({
  testsDir: z.string().min(1).optional(),
  extension: z.string().regex(/^\.[\w.-]+$/).optional(),
  title: z.string().optional(),
  nameWidth: z.number().int().positive().optional(),
  headBytes: z.number().int().positive().optional(),
  gatePlatform: z.string().min(1).optional(),
  captureScope: CaptureScopeSchema.optional(),
  reportOnlyFirstFailure: z.boolean().optional(),
  userConfigPath: z.string().min(1).optional(),
  operations: OperationsConfigSchema.optional(),
  logging: LoggingConfigSchema.optional(),
}).strict();

export type RunnerConfigLayer = z.infer<typeof RunnerConfigLayerSchema>;

export interface OperationsConfig {
  command: string[];
  homeEnv: string;
  userConfigEnv: string;
  noWarnEnv: string;
  timeoutMs?: number;
}

export interface RunnerConfig {
  testsDir: string;
  extension: string;
  title: string;
  nameWidth: number;
  headBytes: number;
  gatePlatform: string;
  captureScope: z.infer<typeof CaptureScopeSchema>;
  reportOnlyFirstFailure: boolean;
  userConfigPath: string;
  operations: OperationsConfig;
  logging: {
    format?: z.infer<typeof LogFormatSchema>;
    verbose: boolean;
    trace: boolean;
  };
}

export const DEFAULT_OPERATIONS: OperationsConfig = {
  command: ['runctl'],
  homeEnv: 'RUNCTL_HOME',
  userConfigEnv: 'RUNCTL_USER_CONFIG',
  noWarnEnv: 'NO_WARN_RUNDIR',
};

export function defaultRunnerConfig(cwd: string = process.cwd()): RunnerConfig {
  return {
    testsDir: path.join(cwd, 'tests'),
    extension: '.md',
    title: 'internal tests',
    nameWidth: 27,
    headBytes: 256,
    gatePlatform: 'win32',
    captureScope: 'file',
    reportOnlyFirstFailure: false,
    userConfigPath: path.join(os.homedir(), '.runctl', 'config.yml'),
    operations: { ...DEFAULT_OPERATIONS, command: [...DEFAULT_OPERATIONS.command] },
    logging: { verbose: false, trace: false },
  };
}

export { CaptureScopeSchema, LogFormatSchema };
