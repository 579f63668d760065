// Part of the Chili3d Project, under the AGPL-3.0 License.
// See LICENSE file in the project root for full license information.

export * from "./entityDecoder";
export * from "./entityScanner";
export * from "./entityStore";
export * from "./propertyReader";
export * from "./spatialTree";
export * from "./stepEntity";
export * from "./stepHeader";
export * from "./stepModel";
export * from "./stepParser";
export * from "./stepTokenizer";
export * from "./units";
