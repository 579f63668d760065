// Part of the Chili3d Project, under the AGPL-3.0 License.
// See LICENSE file in the project root for full license information.

import { describe, expect, test } from "@rstest/core";
import { ProgressPhase, StepSyntaxError } from "stepmesh-core";
import { StepParser } from "../src/stepParser";

const MALFORMED = `DATA;
#4=IFCWALL('w',$,'Wall');
#5 BADSYNTAX;
#6=IFCSLAB('s',$,'Slab');
ENDSEC;`;

const WITH_HEADER = `ISO-10303-21;
HEADER;
FILE_DESCRIPTION(('ViewDefinition [CoordinationView]'),'2;1');
FILE_NAME('model.ifc','2024-01-01T00:00:00',('Author'),('Office'),'pre 1.0','modeller','none');
FILE_SCHEMA(('ifc4'));
ENDSEC;
DATA;
#1=IFCPROJECT('p',$,'Project',$,$,$,$,$,$);
#2=IFCBUILDING('b',$,'Building',$,$,$,$,$,$,$,$,$);
#3=IFCRELAGGREGATES('r',$,$,$,#1,(#2));
ENDSEC;
END-ISO-10303-21;`;

describe("StepParser", () => {
    test("should collect malformed records and keep the rest", () => {
        const model = StepParser.parse(MALFORMED);

        expect(model.size).toBe(2);
        expect(model.errors.length).toBe(1);
        expect(model.errors[0].offset).toBe(MALFORMED.indexOf("#5 BADSYNTAX"));
        expect(model.get(4)?.type).toBe("IFCWALL");
        expect(model.get(6)?.type).toBe("IFCSLAB");
        expect(model.has(5)).toBe(false);
    });

    test("should keep the record after an unterminated malformed line", () => {
        const model = StepParser.parse("DATA;\n#4=IFCWALL('w');\n#5 BADSYNTAX\n#6=IFCSLAB('s');\n#7=IFCBEAM('b');\nENDSEC;");

        expect(model.errors.map((x) => x.message)).toEqual(["Expected '=' after #5 at offset 23"]);
        expect(model.has(6)).toBe(true);
        expect(model.get(7)?.type).toBe("IFCBEAM");
    });

    test("should throw the first malformed record in strict mode", () => {
        expect(() => StepParser.parse(MALFORMED, { strict: true })).toThrow(StepSyntaxError);
    });

    test("should read the header", () => {
        const model = StepParser.parse(WITH_HEADER);

        expect(model.header.description).toEqual(["ViewDefinition [CoordinationView]"]);
        expect(model.header.implementationLevel).toBe("2;1");
        expect(model.header.fileName?.name).toBe("model.ifc");
        expect(model.header.fileName?.authors).toEqual(["Author"]);
        expect(model.header.fileName?.originatingSystem).toBe("modeller");
        expect(model.schemas).toEqual(["IFC4"]);
    });

    test("should report every phase in order with non-decreasing fractions", () => {
        const reports: [string, number][] = [];
        StepParser.parse(WITH_HEADER, {
            progressInterval: 1,
            onProgress: (phase, fraction) => reports.push([phase, fraction]),
        });

        const phases = reports.map(([phase]) => phase).filter((x, i, all) => i === 0 || all[i - 1] !== x);
        expect(phases).toEqual([
            ProgressPhase.scanning,
            ProgressPhase.units,
            ProgressPhase.spatial,
            ProgressPhase.properties,
            ProgressPhase.complete,
        ]);
        expect(reports.at(-1)).toEqual([ProgressPhase.complete, 1]);
        expect(reports.every(([, fraction], i) => i === 0 || fraction >= reports[i - 1][1])).toBe(true);
        expect(reports.filter(([phase]) => phase === ProgressPhase.scanning).at(-1)?.[1]).toBe(0.7);
    });

    test("should skip the spatial tree and properties for geometry-only parsing", () => {
        const options = StepParser.geometryOnly({ strict: true });
        const model = StepParser.parse(WITH_HEADER, options);

        expect(options.strict).toBe(true);
        expect(model.spatialTree).toBeUndefined();
        expect(model.properties).toBeUndefined();
        expect(model.propertySets(2)).toEqual([]);
        expect(StepParser.parse(WITH_HEADER).spatialTree?.children(1)).toEqual([2]);
    });

    test("should stop when the progress callback throws", () => {
        expect(() =>
            StepParser.parse(WITH_HEADER, {
                progressInterval: 1,
                onProgress: () => {
                    throw new Error("stop");
                },
            }),
        ).toThrow("stop");
    });

    test("should stop when the signal is aborted", () => {
        const controller = new AbortController();
        controller.abort();

        expect(() => StepParser.parse(WITH_HEADER, { signal: controller.signal })).toThrow();
    });
});
