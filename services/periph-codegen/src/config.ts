/**
 * Peripheral Codegen - Configuration
 *
 * Centralized configuration management with environment variable support
 */

import { z } from 'zod';

const ConfigSchema = z.object({
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  // Build Metadata
  serviceName: z.string().default('periph-codegen'),
  version: z.string().default('1.0.0'),

  // Generation Output
  generation: z.object({
    outputDir: z.string().default('generated'),
    manifestPath: z.string().default('generated/.codegen-manifest.json'),
    namespaceRoot: z.string().default('hal'),
    registerDocuments: z.array(z.string()).default([]),
    maxConcurrency: z.number().int().positive().default(4),
  }),

  // External Toolchain
  toolchain: z.object({
    clangPath: z.string().default('clang++'),
    cxxStandard: z.string().default('c++17'),
    gccArmPath: z.string().default('arm-none-eabi-g++'),
    sizePath: z.string().default('arm-none-eabi-size'),
    mcu: z.string().default('cortex-m4'),
    optimization: z.enum(['0', '1', '2', '3', 's', 'z']).default('s'),
    strictWarnings: z.boolean().default(true),
    includeDirs: z.array(z.string()).default([]),
    timeoutMs: z.number().int().positive().default(30000),
    killGraceMs: z.number().int().nonnegative().default(2000),
  }),

  // Validation Configuration
  validation: z.object({
    testOutputDir: z.string().default('generated/tests'),
    workDir: z.string().default(''),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

type Env = Record<string, string | undefined>;

function parseIntOr(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

export function loadConfig(env: Env = process.env): Config {
  const rawConfig = {
    nodeEnv: env.NODE_ENV || 'development',
    logLevel: env.LOG_LEVEL || 'info',

    serviceName: env.CODEGEN_SERVICE_NAME || 'periph-codegen',
    version: env.CODEGEN_VERSION || '1.0.0',

    generation: {
      outputDir: env.CODEGEN_OUTPUT_DIR || 'generated',
      manifestPath: env.CODEGEN_MANIFEST_PATH || 'generated/.codegen-manifest.json',
      namespaceRoot: env.CODEGEN_NAMESPACE_ROOT || 'hal',
      registerDocuments: env.CODEGEN_REGISTER_DOCUMENTS?.split(',').filter(Boolean) || [],
      maxConcurrency: parseIntOr(env.CODEGEN_MAX_CONCURRENCY, 4),
    },

    toolchain: {
      clangPath: env.CODEGEN_CLANG_PATH || 'clang++',
      cxxStandard: env.CODEGEN_CXX_STANDARD || 'c++17',
      gccArmPath: env.CODEGEN_GCC_ARM_PATH || 'arm-none-eabi-g++',
      sizePath: env.CODEGEN_SIZE_PATH || 'arm-none-eabi-size',
      mcu: env.CODEGEN_MCU || 'cortex-m4',
      optimization: env.CODEGEN_OPTIMIZATION || 's',
      strictWarnings: env.CODEGEN_STRICT_WARNINGS !== 'false',
      includeDirs: env.CODEGEN_INCLUDE_DIRS?.split(',').filter(Boolean) || [],
      timeoutMs: parseIntOr(env.CODEGEN_TOOL_TIMEOUT_MS, 30000),
      killGraceMs: parseIntOr(env.CODEGEN_KILL_GRACE_MS, 2000),
    },

    validation: {
      testOutputDir: env.CODEGEN_TEST_OUTPUT_DIR || 'generated/tests',
      workDir: env.CODEGEN_WORK_DIR || '',
    },
  };

  return ConfigSchema.parse(rawConfig);
}

export const config = loadConfig();

export function getConfig(): Config {
  return config;
}
