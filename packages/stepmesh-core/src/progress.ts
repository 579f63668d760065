// Part of the Chili3d Project, under the AGPL-3.0 License.
// See LICENSE file in the project root for full license information.

/**
 * Synchronous progress hook. `fraction` is in [0, 1] and never decreases within one parse.
 * An exception thrown here aborts the operation that reported it.
 */
export type ProgressCallback = (phase: string, fraction: number) => void;

export const ProgressPhase = {
    scanning: "Scanning entities",
    units: "Resolving units",
    spatial: "Building spatial tree",
    properties: "Extracting properties",
    complete: "Complete",
} as const;

export type ProgressPhaseName = (typeof ProgressPhase)[keyof typeof ProgressPhase];
