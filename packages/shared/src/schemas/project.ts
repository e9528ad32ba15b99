import { z } from 'zod';

// Git refuses these anywhere in a ref name (git-check-ref-format)
const FORBIDDEN_REF_CHARS = /[\s~^:?*[\\\x00-\x1f\x7f]/;

const ENV_ASSIGNMENT_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*=/;

const SCP_LIKE_URL_PATTERN = /^[A-Za-z0-9._-]+@[A-Za-z0-9.-]+:.+$/;
const SCHEME_URL_PATTERN = /^(https?|ssh|git|file):\/\/.+$/;

/**
 * Branch names are passed to git as arguments, so anything that could be
 * read as an option or an invalid ref is rejected up front.
 */
export function isValidBranchName(branch: string): boolean {
  if (branch.length === 0 || branch.length > 255) return false;
  if (branch.startsWith('-') || branch.startsWith('/') || branch.endsWith('/')) return false;
  if (branch.endsWith('.') || branch.endsWith('.lock')) return false;
  if (branch.includes('..') || branch.includes('//') || branch.includes('@{')) return false;
  return !FORBIDDEN_REF_CHARS.test(branch);
}

export function isValidGitUrl(url: string): boolean {
  if (url.startsWith('-')) return false;
  return SCHEME_URL_PATTERN.test(url) || SCP_LIKE_URL_PATTERN.test(url) || url.startsWith('/');
}

/** Blank lines and `#` comments are tolerated and skipped when the environment is built. */
export function isValidVariableEntry(entry: string): boolean {
  const trimmed = entry.trim();
  if (trimmed === '' || trimmed.startsWith('#')) return true;
  return ENV_ASSIGNMENT_PATTERN.test(trimmed);
}

// Compose files are resolved under the checkout and must stay inside it
const containsPathTraversal = (path: string): boolean =>
  path.split(/[\\/]/).includes('..') || path.includes('\0');

export const HttpGitAuthSchema = z.object({
  type: z.literal('http'),
  username: z.string(),
  password: z.string(),
});

export const SshGitAuthSchema = z.object({
  type: z.literal('ssh'),
  privateKey: z.string(),
  user: z.string().default('git'),
});

/** Shape of a stored credential. Empty strings are legal here. */
export const GitAuthSchema = z.discriminatedUnion('type', [HttpGitAuthSchema, SshGitAuthSchema]);

/** Credentials as supplied by an operator. */
export const GitAuthInputSchema = GitAuthSchema.superRefine((auth, ctx) => {
  if (auth.type === 'http') {
    if (auth.username.trim() === '') {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['username'], message: 'Username is required' });
    }
    if (auth.password === '') {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['password'], message: 'Password or token is required' });
    }
  } else {
    if (auth.privateKey.trim() === '') {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['privateKey'], message: 'Private key is required' });
    }
    if (auth.user.trim() === '' || auth.user.startsWith('-')) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['user'], message: 'Invalid SSH user' });
    }
  }
});

const ProjectNameSchema = z
  .string()
  .trim()
  .min(1, 'Name is required')
  .max(100, 'Name must be at most 100 characters');

const ComposeFilesSchema = z
  .array(
    z
      .string()
      .trim()
      .min(1, 'Compose file path must not be empty')
      .refine((path) => !path.startsWith('/'), 'Compose file path must be relative to the repository root')
      .refine((path) => !containsPathTraversal(path), 'Compose file path must not contain ".."')
  )
  .min(1, 'At least one compose file is required');

const VariablesSchema = z.array(
  z.string().refine(isValidVariableEntry, 'Variables must be KEY=VALUE entries')
);

export const CreateProjectSchema = z.object({
  name: ProjectNameSchema,
  gitUrl: z
    .string()
    .trim()
    .min(1, 'Git URL is required')
    .refine(isValidGitUrl, 'Git URL must be an http(s), ssh, git or file URL'),
  gitBranch: z
    .string()
    .trim()
    .refine((branch) => branch === '' || isValidBranchName(branch), 'Invalid branch name')
    .default(''),
  gitAuth: GitAuthInputSchema.nullable().default(null),
  composeFiles: ComposeFilesSchema,
  composeOverride: z.string().nullable().default(null),
  variables: VariablesSchema.default([]),
  autoDeployEnabled: z.boolean().default(true),
});

export const UpdateProjectSchema = z.object({
  name: ProjectNameSchema.optional(),
  gitAuth: GitAuthInputSchema.nullable().optional(),
  composeFiles: ComposeFilesSchema.optional(),
  composeOverride: z.string().nullable().optional(),
  variables: VariablesSchema.optional(),
  autoDeployEnabled: z.boolean().optional(),
});

/**
 * One line of `docker compose ps --format json`. Missing fields default so
 * that older compose releases still reduce to a status.
 */
export const ContainerInfoSchema = z.object({
  Service: z.string().default(''),
  Name: z.string().default(''),
  State: z.string().default(''),
  Status: z.string().default(''),
  RunningFor: z.string().default(''),
  ExitCode: z.number().int().default(0),
});

export type CreateProjectInput = z.input<typeof CreateProjectSchema>;
export type UpdateProjectInput = z.input<typeof UpdateProjectSchema>;
