// Part of the Chili3d Project, under the AGPL-3.0 License.
// See LICENSE file in the project root for full license information.

import { describe, expect, test } from "@rstest/core";
import { StepParser } from "../src/stepParser";
import { DEFAULT_UNITS, formatUnit, siPrefixFactor } from "../src/units";

const MILLIMETRES = `DATA;
#1=IFCPROJECT('p',$,'P',$,$,$,$,$,#2);
#2=IFCUNITASSIGNMENT((#3));
#3=IFCSIUNIT(*,.LENGTHUNIT.,.MILLI.,.METRE.);
ENDSEC;`;

const IMPERIAL = `DATA;
#1=IFCPROJECT('p',$,'P',$,$,$,$,$,#2);
#2=IFCUNITASSIGNMENT((#3,#6,#12));
#3=IFCCONVERSIONBASEDUNIT(#4,.LENGTHUNIT.,'FOOT',#5);
#4=IFCDIMENSIONALEXPONENTS(1,0,0,0,0,0,0);
#5=IFCMEASUREWITHUNIT(IFCRATIOMEASURE(0.3048),#7);
#7=IFCSIUNIT(*,.LENGTHUNIT.,$,.METRE.);
#6=IFCCONVERSIONBASEDUNIT(#4,.PLANEANGLEUNIT.,'DEGREE',#8);
#8=IFCMEASUREWITHUNIT(IFCPLANEANGLEMEASURE(0.0174532925199433),#9);
#9=IFCSIUNIT(*,.PLANEANGLEUNIT.,$,.RADIAN.);
#10=IFCSIUNIT(*,.TIMEUNIT.,$,.SECOND.);
#11=IFCDERIVEDUNITELEMENT(#10,-1);
#13=IFCDERIVEDUNITELEMENT(#7,1);
#12=IFCDERIVEDUNIT((#13,#11),.LINEARVELOCITYUNIT.,$);
ENDSEC;`;

describe("UnitReader", () => {
    test("should read a prefixed SI length unit", () => {
        const model = StepParser.parse(MILLIMETRES);

        expect(model.unitScale).toBe(0.001);
        expect(model.units.angleScale).toBe(1);
        expect(model.units.labels.get("LENGTHUNIT")).toBe("mm");
    });

    test("should resolve conversion based units", () => {
        const model = StepParser.parse(IMPERIAL);

        expect(model.units.lengthScale).toBe(0.3048);
        expect(model.units.angleScale).toBeCloseTo(Math.PI / 180, 12);
        expect(model.units.labels.get("LENGTHUNIT")).toBe("FOOT");
        expect(model.units.labels.get("LINEARVELOCITYUNIT")).toBe("m·s^-1");
        expect(formatUnit(model, 9)).toBe("rad");
    });

    test("should fall back to metres and radians", () => {
        expect(StepParser.parse("DATA;#1=IFCWALL('w');ENDSEC;").units).toBe(DEFAULT_UNITS);
        expect(StepParser.parse("DATA;#1=IFCPROJECT('p',$,'P',$,$,$,$,$,#5);ENDSEC;").units).toBe(DEFAULT_UNITS);
    });

    test("should map SI prefixes", () => {
        expect(siPrefixFactor("KILO")).toBe(1000);
        expect(siPrefixFactor("MILLI")).toBe(0.001);
        expect(siPrefixFactor(undefined)).toBe(1);
        expect(siPrefixFactor("UNKNOWN")).toBe(1);
    });
});
