/**
 * Runtime environment checks.
 *
 * The logger picks line output and stdout under CI; the observer turns on
 * its spy under `STAGECRAFT_DEBUG`.
 */

/**
 * Variables set by common CI providers.
 */
const CI_MARKERS = [
    'CI',
    'CONTINUOUS_INTEGRATION',
    'GITHUB_ACTIONS',
    'GITLAB_CI',
    'CIRCLECI',
    'BUILDKITE',
    'JENKINS_URL',
    'CODEBUILD_BUILD_ID',
    'TF_BUILD',
];

/** Truthy unless unset, empty, `0` or `false`. */
function flag(name: string): boolean {

    const value = process.env[name];

    return value !== undefined && value !== '' && value !== '0' && value !== 'false';

}

/**
 * True when output is not interactive: `STAGECRAFT_HEADLESS`, a CI
 * provider, or stdout without a TTY.
 */
export function isCi(): boolean {

    return flag('STAGECRAFT_HEADLESS')
        || CI_MARKERS.some((name) => Boolean(process.env[name]))
        || !process.stdout.isTTY;

}

export function isTest(): boolean {

    return process.env['NODE_ENV'] === 'test' || process.env['VITEST'] !== undefined;

}

export function isDebug(): boolean {

    return flag('STAGECRAFT_DEBUG');

}
