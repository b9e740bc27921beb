import { z } from "zod";
import { LookupError, errorMessage } from "../errors.js";
import type { FetchLike, VideoCatalog, VideoMetadata } from "./types.js";

const USER_AGENT = "watchlog/0.1 (spreadsheet metadata lookup)";

const videoListSchema = z.object({
	items: z
		.array(
			z.object({
				id: z.string().optional(),
				contentDetails: z.object({ duration: z.string().optional() }).optional(),
				snippet: z
					.object({
						title: z.string().optional(),
						channelTitle: z.string().optional(),
						publishedAt: z.string().optional(),
					})
					.optional(),
			}),
		)
		.default([]),
});

export type YoutubeCatalogOptions = {
	apiKey: string;
	endpoint: string;
	fetchImpl?: FetchLike;
};

export function createYoutubeCatalog(options: YoutubeCatalogOptions): VideoCatalog {
	const fetchImpl = options.fetchImpl ?? fetch;

	return {
		async lookup(videoId: string): Promise<VideoMetadata | null> {
			const params = new URLSearchParams({
				part: "contentDetails,snippet",
				id: videoId,
				key: options.apiKey,
			});
			const payload = await fetchJson(fetchImpl, `${options.endpoint}?${params}`, videoId);

			const parsed = videoListSchema.safeParse(payload);
			if (!parsed.success) {
				throw new LookupError(videoId, `Unexpected YouTube API response: ${parsed.error.message}`);
			}

			const item = parsed.data.items[0];
			if (!item) return null;

			const duration = item.contentDetails?.duration;
			const publishedAt = item.snippet?.publishedAt ? new Date(item.snippet.publishedAt) : null;
			return {
				videoId,
				title: item.snippet?.title ?? null,
				durationMinutes: duration ? parseIsoDuration(duration) : null,
				publishedAt: publishedAt && !Number.isNaN(publishedAt.getTime()) ? publishedAt : null,
				channel: item.snippet?.channelTitle ?? null,
			};
		},
	};
}

async function fetchJson(fetchImpl: FetchLike, url: string, videoId: string): Promise<unknown> {
	let response: Response;
	try {
		response = await fetchImpl(url, {
			headers: {
				"User-Agent": USER_AGENT,
				Accept: "application/json",
			},
		});
	} catch (error) {
		throw new LookupError(videoId, `YouTube API request failed: ${errorMessage(error)}`, {
			cause: error,
		});
	}

	if (!response.ok) {
		throw new LookupError(
			videoId,
			`YouTube API error: ${response.status} ${response.statusText}`.trimEnd(),
		);
	}

	try {
		return await response.json();
	} catch (error) {
		throw new LookupError(videoId, "YouTube API returned invalid JSON", { cause: error });
	}
}

/**
 * Converts an ISO-8601 duration (`PT1H2M30S`) to minutes. Seconds are
 * rounded to steps of 3s and counted as 0.05 min each, so 30s → 0.5.
 */
export function parseIsoDuration(duration: string): number | null {
	const parts = new Map<string, number>();
	for (const [, value, unit] of duration.matchAll(/(\d+)([DHMS])/g)) {
		if (value && unit) parts.set(unit, Number(value));
	}
	if (parts.size === 0) return null;

	const minutes =
		(parts.get("D") ?? 0) * 1440 + (parts.get("H") ?? 0) * 60 + (parts.get("M") ?? 0);
	const fraction = (Math.round((parts.get("S") ?? 0) / 3) * 5) / 100;
	return Math.round((minutes + fraction) * 100) / 100;
}

export function extractVideoId(link: string, pattern: RegExp): string | undefined {
	return pattern.exec(link)?.[1];
}
