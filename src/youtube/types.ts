export type VideoMetadata = {
	videoId: string;
	title: string | null;
	/** Whole minutes plus seconds in steps of 0.05 */
	durationMinutes: number | null;
	publishedAt: Date | null;
	channel: string | null;
};

export interface VideoCatalog {
	/**
	 * Resolves to null when the catalog has no such video.
	 * @throws LookupError when the request itself fails
	 */
	lookup(videoId: string): Promise<VideoMetadata | null>;
}

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;
