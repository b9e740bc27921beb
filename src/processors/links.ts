import { errorMessage } from "../errors.js";
import { formatTitle, log } from "../ui/logger.js";
import { formatTimestamp } from "../utils/dates.js";
import { FIRST_DATA_ROW, type SheetTable } from "../workbook/table.js";
import { extractVideoId } from "../youtube/fetch.js";
import type { VideoCatalog, VideoMetadata } from "../youtube/types.js";

export const LINK_FIELDS = ["Title", "Duration", "Published", "Author", "Exist"] as const;
export type LinkField = (typeof LINK_FIELDS)[number];

/** Metadata written back for one link, keyed by the sheet's column names. */
export type LinkInfo = {
	Title: string | null;
	Duration: number | null;
	Published: string | null;
	Author: string | null;
	Exist: string | null;
};

export type LinkFailure = {
	row: number;
	link: string;
	videoId: string;
	reason: string;
};

/** Rows to scan. `end` is inclusive; without one the scan runs to the data end. */
export type LinkWindow = { kind: "range"; start: number; end?: number } | { kind: "auto" };

export interface ProgressReporter {
	start(label: string, total: number): void;
	advance(outcome?: "ok" | "failed"): void;
	stop(): void;
}

export type ExtractLinksOptions = {
	catalog: VideoCatalog;
	window: LinkWindow;
	/** Upper bound on catalog lookups in this run */
	chunk?: number;
	idPattern: RegExp;
	missingMarker: string;
	progress?: ProgressReporter;
};

export type LinksResult = {
	links: Record<string, LinkInfo>;
	failures: LinkFailure[];
	lookups: number;
	/** Rows scanned, `end` exclusive; null when auto-search found nothing */
	window: { start: number; end: number } | null;
};

type Candidate = { row: number; link: string; videoId: string };

/**
 * Looks up every unprocessed video link in the window and fills the
 * placeholder cells of its row. A failed lookup is recorded and skipped.
 */
export async function extractLinks(
	table: SheetTable,
	options: ExtractLinksOptions,
): Promise<LinksResult> {
	const columns = {
		Title: table.column("Title"),
		Duration: table.requireColumn("Duration"),
		Published: table.requireColumn("Published"),
		Author: table.requireColumn("Author"),
		Exist: table.requireColumn("Exist"),
	} satisfies Record<LinkField, number | undefined>;
	const { Exist: existColumn, Duration, Published, Author } = columns;
	const detailColumns = [Duration, Published, Author];

	const isUnprocessed = (row: number): boolean =>
		table.isPlaceholder(table.value(row, existColumn)) &&
		detailColumns.some((column) => table.isPlaceholder(table.value(row, column)));

	const candidateAt = (row: number): Candidate | undefined => {
		const link = table.key(row);
		if (typeof link !== "string") return undefined;
		const videoId = extractVideoId(link, options.idPattern);
		if (!videoId || !isUnprocessed(row)) return undefined;
		return { row, link, videoId };
	};

	const window = resolveWindow(table, options.window, candidateAt);
	const result: LinksResult = { links: {}, failures: [], lookups: 0, window };
	if (!window) {
		log.info("No unprocessed links found");
		return result;
	}
	log.info(`Scanning rows ${window.start}-${window.end - 1}`);

	const candidates: Candidate[] = [];
	for (let row = window.start; row < window.end; row++) {
		const candidate = candidateAt(row);
		if (candidate) candidates.push(candidate);
	}
	const batch =
		options.chunk !== undefined ? candidates.slice(0, Math.max(0, options.chunk)) : candidates;

	options.progress?.start("Fetching video details", batch.length);
	try {
		for (const candidate of batch) {
			result.lookups++;
			let metadata: VideoMetadata | null;
			try {
				metadata = await options.catalog.lookup(candidate.videoId);
			} catch (error) {
				const reason = errorMessage(error);
				result.failures.push({ ...candidate, reason });
				log.warn(`Lookup failed for row ${candidate.row}`, {
					videoId: candidate.videoId,
					reason,
				});
				options.progress?.advance("failed");
				continue;
			}

			const info = toLinkInfo(metadata, options.missingMarker);
			for (const field of LINK_FIELDS) {
				const column = columns[field];
				const value = info[field];
				if (column === undefined || !value) continue;
				if (table.isPlaceholder(table.value(candidate.row, column))) {
					table.sheet.setValue(candidate.row, column, value);
				}
			}
			result.links[candidate.link] = info;

			if (info.Exist) {
				log.warn(`Row ${candidate.row} marked ${info.Exist}`, { videoId: candidate.videoId });
			} else {
				log.debug(`Fetched ${formatTitle(info.Title ?? candidate.videoId)}`, {
					row: candidate.row,
				});
			}
			options.progress?.advance("ok");
		}
	} finally {
		options.progress?.stop();
	}

	return result;
}

function resolveWindow(
	table: SheetTable,
	window: LinkWindow,
	candidateAt: (row: number) => Candidate | undefined,
): { start: number; end: number } | null {
	const dataEnd = table.dataEnd();
	if (window.kind === "range") {
		return {
			start: window.start,
			end: window.end !== undefined ? window.end + 1 : Math.max(dataEnd, window.start),
		};
	}

	for (let row = FIRST_DATA_ROW; row < dataEnd; row++) {
		if (candidateAt(row)) {
			log.info(`Starting row: ${row}`);
			return { start: row, end: dataEnd };
		}
	}
	return null;
}

export function toLinkInfo(metadata: VideoMetadata | null, missingMarker: string): LinkInfo {
	const info: LinkInfo = {
		Title: metadata?.title ?? null,
		Duration: metadata?.durationMinutes ?? null,
		Published: metadata?.publishedAt ? formatTimestamp(metadata.publishedAt) : null,
		Author: metadata?.channel ?? null,
		Exist: null,
	};
	if (!info.Duration || !info.Published || !info.Author) {
		info.Exist = missingMarker;
	}
	return info;
}
