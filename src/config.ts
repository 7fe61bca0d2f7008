/**
 * @module
 * Build settings. Every setting is taken from an explicit argument, then from the environment, then from its
 * default.
 */
import {
    z,
} from 'zod';
import {
    ConfigurationError,
} from './errors';

/** Target run when none is given. */
export const DEFAULT_TARGET = 'Default';

/**
 * CI services recognised from their environment variables.
 */
export type CiHost = 'appveyor' | 'azure-pipelines' | 'github-actions' | 'travis';

/**
 * Resolved build settings, shared by every task of a run.
 */
export interface BuildSettings {
    target: string;
    /** Build configuration, e.g. `Debug` or `Release`. */
    configuration: string;
    /** Directory receiving test results and packages. */
    artifactsDir: string;
    /** Pre-release label of the package version. Absent for release builds. */
    preReleaseSuffix?: string;
    buildNumber: number;
    /** CI service the build runs on, if any. */
    ciHost?: CiHost;
}

/**
 * Settings given explicitly, e.g. on the command line.
 */
export interface BuildArguments {
    target?: string;
    configuration?: string;
    artifactsDir?: string;
    preReleaseSuffix?: string;
    buildNumber?: string | number;
}

type Environment = Record<string, string | undefined>;

const settingsSchema = z.object({
    artifactsDir: z.string().min(1, 'artifacts directory must not be empty'),
    buildNumber: z.coerce.number().int('build number must be an integer').nonnegative('build number must not be negative'),
    configuration: z.string().min(1, 'configuration must not be empty'),
    preReleaseSuffix: z.string().regex(/^[0-9A-Za-z.-]*$/, 'pre-release suffix may only contain alphanumerics, hyphens and dots').optional(),
    target: z.string().min(1, 'target must not be empty'),
});

/**
 * Returns `explicit` if given, else the environment variable `name`, else `fallback`.
 */
export function resolveSetting(explicit: string | undefined, env: Environment, name: string, fallback: string): string;
export function resolveSetting(explicit: string | undefined, env: Environment, name: string, fallback?: string): string | undefined;
export function resolveSetting(explicit: string | undefined, env: Environment, name: string, fallback?: string): string | undefined {
    if (explicit !== undefined)
        return explicit;
    const value = env[name];
    if (value !== undefined && value !== '')
        return value;
    return fallback;
}

/**
 * Detects the CI service from its well-known environment variables.
 */
export function detectCiHost(env: Environment): CiHost | undefined {
    if (isTrue(env['APPVEYOR']))
        return 'appveyor';
    if (isTrue(env['TF_BUILD']))
        return 'azure-pipelines';
    if (isTrue(env['GITHUB_ACTIONS']))
        return 'github-actions';
    if (isTrue(env['TRAVIS']))
        return 'travis';
    return undefined;
}

/**
 * Resolves and validates the build settings.
 *
 * On AppVeyor, tag builds are release builds (no pre-release suffix unless given explicitly) and the build
 * number defaults to AppVeyor's.
 *
 * @throws {ConfigurationError} if a setting is invalid.
 */
export function loadSettings(args: BuildArguments = {}, env: Environment = process.env): BuildSettings {
    const ciHost = detectCiHost(env);
    const onAppVeyor = ciHost === 'appveyor';
    const isReleaseTag = onAppVeyor && isTrue(env['APPVEYOR_REPO_TAG']);

    const buildNumber = args.buildNumber !== undefined ?
        String(args.buildNumber) :
        (onAppVeyor && env['APPVEYOR_BUILD_NUMBER']) || resolveSetting(undefined, env, 'BUILD_NUMBER', '0');
    const preReleaseSuffix = isReleaseTag && args.preReleaseSuffix === undefined ?
        undefined :
        resolveSetting(args.preReleaseSuffix, env, 'PRE_RELEASE_SUFFIX', 'beta');

    const parsed = settingsSchema.safeParse({
        artifactsDir: resolveSetting(args.artifactsDir, env, 'ARTIFACTS_DIR', 'Artifacts'),
        buildNumber,
        configuration: resolveSetting(args.configuration, env, 'CONFIGURATION', 'Release'),
        preReleaseSuffix: preReleaseSuffix || undefined,
        target: resolveSetting(args.target, env, 'TARGET', DEFAULT_TARGET),
    });
    if (!parsed.success)
        throw new ConfigurationError(`Invalid build settings: ${parsed.error.issues.map(formatIssue).join('; ')}`);
    return {...parsed.data, ciHost};
}

/**
 * Returns the package version suffix, e.g. `beta-0042`, or `undefined` for release builds.
 */
export function versionSuffix(settings: BuildSettings): string | undefined {
    if (!settings.preReleaseSuffix)
        return undefined;
    return `${settings.preReleaseSuffix}-${String(settings.buildNumber).padStart(4, '0')}`;
}

function formatIssue(issue: z.ZodIssue): string {
    return issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message;
}

function isTrue(value: string | undefined): boolean {
    return value !== undefined && value.toLowerCase() === 'true';
}
