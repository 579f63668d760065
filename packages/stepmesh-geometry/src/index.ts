// Part of the Chili3d Project, under the AGPL-3.0 License.
// See LICENSE file in the project root for full license information.

export * from "./curves";
export * from "./extrusion";
export * from "./geometryRouter";
export * from "./mesh";
export * from "./openings";
export * from "./placement";
export * from "./processors/extrudedAreaSolid";
export * from "./processors/facetedBrep";
export * from "./processors/processor";
export * from "./processors/revolvedAreaSolid";
export * from "./processors/sweptDiskSolid";
export * from "./processors/triangulatedFaceSet";
export * from "./profile";
export * from "./profileReader";
export * from "./triangulation";
