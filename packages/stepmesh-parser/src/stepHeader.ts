// Part of the Chili3d Project, under the AGPL-3.0 License.
// See LICENSE file in the project root for full license information.

import { Logger, StepSyntaxError } from "stepmesh-core";
import { tokenToAttribute } from "./entityDecoder";
import { findStatementEnd } from "./entityScanner";
import { asList, asString, type AttributeValue } from "./stepEntity";
import { StepTokenizer } from "./stepTokenizer";

export interface IStepFileName {
    name: string;
    timeStamp: string;
    authors: string[];
    organizations: string[];
    preprocessorVersion: string;
    originatingSystem: string;
    authorization: string;
}

export interface IStepHeader {
    description: string[];
    implementationLevel: string;
    fileName?: IStepFileName;
    schemas: string[];
}

export class StepHeaderReader {
    static read(text: string): IStepHeader {
        const section = extractHeaderSection(text);
        const description = readHeaderRecord(section, "FILE_DESCRIPTION");
        const fileName = readHeaderRecord(section, "FILE_NAME");
        const schema = readHeaderRecord(section, "FILE_SCHEMA");

        return {
            description: stringList(description?.[0]),
            implementationLevel: asString(description?.[1]) ?? "",
            fileName: fileName && {
                name: asString(fileName[0]) ?? "",
                timeStamp: asString(fileName[1]) ?? "",
                authors: stringList(fileName[2]),
                organizations: stringList(fileName[3]),
                preprocessorVersion: asString(fileName[4]) ?? "",
                originatingSystem: asString(fileName[5]) ?? "",
                authorization: asString(fileName[6]) ?? "",
            },
            schemas: stringList(schema?.[0]).map((x) => x.toUpperCase()),
        };
    }
}

function extractHeaderSection(text: string): string {
    const upper = text.toUpperCase();
    const headerStart = upper.indexOf("HEADER;");
    const dataStart = upper.indexOf("DATA;");
    if (headerStart < 0 || dataStart < 0 || dataStart <= headerStart) {
        return "";
    }
    return text.slice(headerStart + "HEADER;".length, dataStart);
}

function readHeaderRecord(section: string, keyword: string): readonly AttributeValue[] | undefined {
    const match = new RegExp(`\\b${keyword}\\s*\\(`, "i").exec(section);
    if (!match) return undefined;

    const open = match.index + match[0].length - 1;
    const terminator = findStatementEnd(section, open);
    const end = terminator < 0 ? section.length : terminator;
    try {
        return StepTokenizer.tokenize(section, open, end).map(tokenToAttribute);
    } catch (error) {
        if (!(error instanceof StepSyntaxError)) throw error;
        Logger.warn(`Ignoring malformed ${keyword} header record: ${error.message}`);
        return undefined;
    }
}

function stringList(value: AttributeValue | undefined): string[] {
    return (asList(value) ?? []).map(asString).filter((x): x is string => x !== undefined);
}
