import { CsvParser } from "../parsers/csv.parser.js";
import { BuildConfig, IngestOutput } from "../types/index.js";
import { IngestionError } from "../utils/errors.js";
import { stageLogger } from "../utils/logger.js";
import { resolveInside } from "../utils/project.js";

const log = stageLogger("ingest");

export class IngestStage {
    private csvParser = new CsvParser();

    async execute(config: BuildConfig): Promise<IngestOutput> {
        log.info(`Starting ingest stage for ${config.scriptName}`);
        const startTime = Date.now();

        const scriptPath = resolveInside(config.inputPath, config.scriptName);
        if (!scriptPath) {
            throw new IngestionError(`Script name '${config.scriptName}' is outside ${config.inputPath}`);
        }

        const output = await this.csvParser.parseFile(scriptPath);
        if (output.rows.length === 0) {
            throw new IngestionError(`${scriptPath} has a header but no rows`);
        }

        const kinds = output.rows.reduce<Record<string, number>>((counts, row) => {
            counts[row.kind] = (counts[row.kind] ?? 0) + 1;
            return counts;
        }, {});
        log.info(`Ingest stage complete: ${output.rows.length} rows in ${Date.now() - startTime}ms`, { kinds });

        return output;
    }
}
