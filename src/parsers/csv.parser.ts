import { readFile } from "fs/promises";
import { existsSync } from "fs";
import { parse } from "csv-parse/sync";
import { z } from "zod";

import { classify } from "../player/scene.js";
import { Delimiter, IngestOutput, ScenarioRow } from "../types/index.js";
import { IngestionError, errorMessage } from "../utils/errors.js";
import { stageLogger } from "../utils/logger.js";

const log = stageLogger("ingest");

/** Tried in this order; the first one that yields a usable header wins. */
export const SCENARIO_ENCODINGS = [
    "utf-8",
    "utf-16",
    "utf-16le",
    "utf-16be",
    "shift_jis",
    "windows-31j"
] as const;

export const SNIFF_SAMPLE_SIZE = 1024;
export const SCENE_ID_COLUMN = "scene_id";

const recordsSchema = z.array(z.record(z.string(), z.string()));

type ScenarioRecord = Record<string, string>;

export function decodeStrict(bytes: Uint8Array, encoding: string): string | undefined {
    try {
        return new TextDecoder(encoding, { fatal: true }).decode(bytes);
    } catch {
        // Undecodable bytes, or an encoding this runtime's ICU lacks.
        return undefined;
    }
}

function headerLine(sample: string): string {
    let inQuotes = false;
    for (let i = 0; i < sample.length; i++) {
        const char = sample[i];
        if (char === "\"") {
            inQuotes = !inQuotes;
        } else if ((char === "\n" || char === "\r") && !inQuotes) {
            return sample.slice(0, i);
        }
    }
    return sample;
}

function countOutsideQuotes(line: string, needle: string): number {
    let inQuotes = false;
    let count = 0;
    for (const char of line) {
        if (char === "\"") {
            inQuotes = !inQuotes;
        } else if (char === needle && !inQuotes) {
            count++;
        }
    }
    return count;
}

export function sniffDelimiter(text: string): Delimiter {
    const header = headerLine(text.slice(0, SNIFF_SAMPLE_SIZE));
    const tabs = countOutsideQuotes(header, "\t");
    const commas = countOutsideQuotes(header, ",");
    return tabs > commas ? "\t" : ",";
}

/**
 * Parses decoded text. Returns undefined when the text is not a scenario
 * table in this dialect: unparsable, or no `scene_id` column in the header.
 */
export function parseScenarioRecords(text: string, delimiter: Delimiter): ScenarioRecord[] | undefined {
    let header: string[] = [];
    let records: unknown;
    try {
        records = parse(text, {
            delimiter,
            columns: (names: string[]) => {
                header = names.map((name) => String(name).trim());
                return header;
            },
            skip_empty_lines: true,
            relax_column_count: true,
            relax_quotes: true
        });
    } catch (error) {
        log.debug(`CSV parse failed: ${errorMessage(error)}`);
        return undefined;
    }

    if (!header.includes(SCENE_ID_COLUMN)) {
        return undefined;
    }

    const parsed = recordsSchema.safeParse(records);
    return parsed.success ? parsed.data : undefined;
}

const field = (record: ScenarioRecord, column: string): string => record[column] ?? "";

export function toScenarioRow(record: ScenarioRecord): ScenarioRow {
    const sceneId = field(record, SCENE_ID_COLUMN).trim();
    return {
        sceneId,
        kind: classify(sceneId),
        speaker: field(record, "person_name").trim(),
        text: field(record, "text").replace(/\r\n?/g, "\n"),
        effect: field(record, "effect"),
        background: field(record, "background_image").trim(),
        portraitLeft: field(record, "left_standing_portrait_image").trim(),
        portraitCenter: field(record, "center_standing_portrait_image").trim(),
        portraitRight: field(record, "right_standing_portrait_image").trim(),
        sound: field(record, "sounds").trim(),
        music: field(record, "bgm").trim()
    };
}

export class CsvParser {
    async parseFile(filePath: string): Promise<IngestOutput> {
        if (!existsSync(filePath)) {
            throw new IngestionError(`Scenario script not found: ${filePath}`);
        }

        let bytes: Buffer;
        try {
            bytes = await readFile(filePath);
        } catch (error) {
            throw new IngestionError(`Failed to read ${filePath}: ${errorMessage(error)}`, { cause: error });
        }

        for (const encoding of SCENARIO_ENCODINGS) {
            const text = decodeStrict(bytes, encoding);
            if (text === undefined) {
                continue;
            }

            const delimiter = sniffDelimiter(text);
            const records = parseScenarioRecords(text, delimiter);
            if (!records) {
                continue;
            }

            log.info(
                `Read ${records.length} rows from ${filePath} (encoding: ${encoding}, delimiter: ${
                    delimiter === "\t" ? "tab" : "comma"
                })`
            );
            return {
                rows: records.map(toScenarioRow),
                metadata: { source: filePath, encoding, delimiter }
            };
        }

        throw new IngestionError(
            `Could not read ${filePath} as a scenario script (tried ${SCENARIO_ENCODINGS.join(", ")}; ` +
                `a "${SCENE_ID_COLUMN}" column is required)`
        );
    }
}
