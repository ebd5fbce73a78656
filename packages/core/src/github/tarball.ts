/**
 * Repository tarball download.
 */

import { getErrorMessage, isCancellationError } from "../errors.js";
import { readArchiveResponse, type ExtractionResult } from "../archive/index.js";
import { fetchResponse } from "../http/index.js";
import type { Matcher } from "../matcher/index.js";
import { getRequestOptions, type GitHubClient } from "./client.js";

/**
 * Options for downloading repository files.
 */
export interface DownloadRepositoryFilesOptions {
	/** AbortSignal for cancellation. */
	signal?: AbortSignal;
	/** Maximum bytes held in memory. */
	maxSize?: number;
}

/**
 * Build the REST API URL of a repository tarball.
 *
 * @param apiUrl - API base URL without trailing slash
 * @param owner - Repository owner
 * @param repo - Repository name
 * @param ref - Branch, tag or commit; slashes are kept
 * @returns Tarball URL
 */
export function buildTarballUrl(apiUrl: string, owner: string, repo: string, ref: string): string {
	const encodedRef = ref.split("/").map(encodeURIComponent).join("/");
	return `${apiUrl}/repos/${encodeURIComponent(owner)}/${encodeURIComponent(repo)}/tarball/${encodedRef}`;
}

/**
 * Download the files of a repository at a ref whose paths satisfy `include`.
 *
 * The top-level `<owner>-<repo>-<sha>/` directory GitHub wraps tarballs in is
 * stripped, so keys are repository-relative paths.
 *
 * This is best-effort: any status other than 200 and any failure is logged as
 * a warning and yields `null`. Only cancellation through `options.signal` is
 * thrown, including an abort while the body is being extracted.
 *
 * @param client - GitHub client
 * @param owner - Repository owner
 * @param repo - Repository name
 * @param ref - Branch, tag or commit
 * @param include - Inclusion predicate over repository-relative paths
 * @param options - Download options
 * @returns Extracted files, or null when the download failed
 */
export async function downloadRepositoryFiles(
	client: GitHubClient,
	owner: string,
	repo: string,
	ref: string,
	include: Matcher,
	options: DownloadRepositoryFilesOptions = {},
): Promise<ExtractionResult | null> {
	const { logger } = client;
	const url = buildTarballUrl(client.apiUrl, owner, repo, ref);

	logger.debug(`Downloading tarball for repo: ${url}`);

	try {
		const response = await fetchResponse(url, {
			...getRequestOptions(client, "*/*", options.signal),
			returnErrorStatus: true,
		});

		if (response.status !== 200) {
			await response.body?.cancel();
			logger.warn(`failed to download repository: unexpected code ${response.status}`);
			return null;
		}

		return await readArchiveResponse(response, {
			stripDepth: 1,
			include,
			logger,
			maxSize: options.maxSize,
			signal: options.signal,
		});
	} catch (error) {
		if (isCancellationError(error)) {
			throw error;
		}
		logger.warn(`failed to download repository: ${getErrorMessage(error)}`);
		return null;
	}
}
