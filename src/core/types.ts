import { z } from 'zod';

// ===== Configuration =====

const commandSchema = z.array(z.string()).min(1);

export const GateConfigSchema = z.object({
  project: z.object({
    /** Conda package name installed into the test environment */
    package: z.string().min(1),
  }),
  repository: z.object({
    /** Canonical upstream slug; forks never publish */
    official: z.string().regex(/^[^/\s]+\/[^/\s]+$/, 'expected "owner/repo"'),
    trunkBranch: z.string().min(1).default('master'),
  }),
  conda: z.object({
    channels: z.array(z.string()).default(['pcds-tag']),
    appendChannels: z.array(z.string()).default(['conda-forge']),
    recipeDir: z.string().default('conda-recipe'),
    outputFolder: z.string().default('bld-dir'),
    envName: z.string().default('test-environment'),
    pythonVersion: z.string().default('3.6'),
    requirements: z.string().default('dev-requirements.txt'),
    buildTools: z.array(z.string()).default(['conda-build', 'anaconda-client']),
    showInfo: z.boolean().default(true),
  }).default({}),
  tests: z.object({
    commands: z.array(commandSchema).default([
      ['coverage', 'run', 'run_tests.py'],
      ['coverage', 'report', '-m'],
    ]),
    lint: commandSchema.default(['flake8']),
    /** Defaults to `<package>/*.py` */
    lintGlobs: z.array(z.string()).optional(),
  }).default({}),
  coverage: z.object({
    upload: z.boolean().default(true),
    command: commandSchema.default(['codecov']),
  }).default({}),
  docs: z.object({
    /** Matrix flag; any non-empty value requests a docs build */
    flagVariable: z.string().default('BUILD_DOCS'),
    /** Defaults to DOCTR_DEPLOY_ENCRYPTION_KEY_<OWNER>_<REPO> */
    deployKeyVariable: z.string().optional(),
    sourceDir: z.string().default('docs'),
    builtDir: z.string().default('docs/build/html'),
    deployBranch: z.string().default('gh-pages'),
    requirements: z.string().default('docs-requirements.txt'),
    pipPackages: z.array(z.string()).default(['m2r']),
  }).default({}),
  publish: z.object({
    /** Defaults to `<outputFolder>/linux-64/*.tar.bz2` */
    artifactGlob: z.string().optional(),
    platform: z.string().default('linux-64'),
    tokenVariable: z.string().default('ANACONDA_API_TOKEN'),
    credentials: z.object({
      dev: z.string().default('CONDA_UPLOAD_TOKEN_DEV'),
      tag: z.string().default('CONDA_UPLOAD_TOKEN_TAG'),
    }).default({}),
  }).default({}),
  logging: z.object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'silent']).default('info'),
    format: z.enum(['pretty', 'json']).default('pretty'),
  }).default({}),
});

export type GateConfig = z.infer<typeof GateConfigSchema>;
export type GateConfigInput = z.input<typeof GateConfigSchema>;

// ===== Pipeline =====

export type PipelineStage = 'config' | 'install' | 'script' | 'deploy' | 'after_success';
