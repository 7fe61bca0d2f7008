/**
 * @module
 * Detection of optional tools in the build environment.
 */
import {
    describeError,
} from './errors';
import {
    Invoker,
} from './invoke';
import {
    createLogger,
} from './logger';

const log = createLogger('capability');

/**
 * Detected capabilities, keyed by capability name. Names missing from the map count as absent.
 */
export type Capabilities = ReadonlyMap<string, boolean>;

/**
 * A capability that is present if `command` exits successfully.
 */
export interface CapabilityProbe {
    name: string;
    command: string;
    args?: readonly string[];
}

/**
 * Maps a capability to the test trait that marks tests needing it.
 */
export interface TraitMapping {
    capability: string;
    trait: string;
}

/**
 * Runs `probe` and reports whether it succeeded. Never throws.
 *
 * A probe fails if it throws, rejects or returns `false`.
 */
export async function detectCapability(probe: () => unknown): Promise<boolean> {
    try {
        return (await probe()) !== false;
    } catch (e) {
        log.debug({error: describeError(e)}, 'capability probe failed');
        return false;
    }
}

/**
 * Runs every probe in turn and collects the results.
 */
export async function detectCapabilities(probes: readonly CapabilityProbe[], invoker: Invoker): Promise<Capabilities> {
    const capabilities = new Map<string, boolean>();
    for (const probe of probes) {
        const present = await detectCapability(() => invoker(probe.command, probe.args || [], {output: discard}));
        log.debug({capability: probe.name, present}, 'detected capability');
        capabilities.set(probe.name, present);
    }
    return capabilities;
}

/**
 * Builds a test filter expression that excludes the tests whose capability is absent.
 *
 * @returns e.g. `IsUsingDocker!=true&IsUsingDotnetRun!=true`, or `''` if nothing is excluded.
 */
export function buildTestFilter(capabilities: Capabilities, traits: readonly TraitMapping[]): string {
    return traits
        .filter(mapping => !capabilities.get(mapping.capability))
        .map(mapping => `${mapping.trait}!=true`)
        .join('&');
}

function discard(): void {
    // probe output is not interesting
}
