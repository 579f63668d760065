// Part of the Chili3d Project, under the AGPL-3.0 License.
// See LICENSE file in the project root for full license information.

import { fileURLToPath } from "node:url";
import { defineConfig } from "@rstest/core";

const packageSource = (name: string) => fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
    include: ["packages/**/test/**/*.test.ts"],
    testEnvironment: "node",
    resolve: {
        alias: {
            "stepmesh-core": packageSource("stepmesh-core"),
            "stepmesh-parser": packageSource("stepmesh-parser"),
            "stepmesh-geometry": packageSource("stepmesh-geometry"),
        },
    },
});
