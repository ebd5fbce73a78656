/**
 * Workflow-run artifact lookup and download.
 */

import { readArchiveResponse, type ExtractionResult } from "../archive/index.js";
import { parseRepository, runId as environmentRunId } from "../environment/index.js";
import { ArtifactNotFoundError, NetworkError } from "../errors.js";
import { fetchJson, fetchResponse } from "../http/index.js";
import { matchAll } from "../matcher/index.js";
import { getRequestOptions, handleGitHubError, type GitHubClient } from "./client.js";

const PAGE_SIZE = 100;

/**
 * Workflow-run artifact metadata.
 */
export interface WorkflowArtifact {
	/** Artifact ID. */
	id: number;
	/** Artifact name. */
	name: string;
	/** Size of the zip archive in bytes. */
	sizeInBytes: number;
	/** API URL that redirects to the zip archive. */
	archiveDownloadUrl: string;
	/** Whether the artifact has expired. */
	expired: boolean;
	/** ISO timestamp when created. */
	createdAt?: string;
	/** ISO timestamp when it expires. */
	expiresAt?: string;
}

/**
 * Raw artifact response from GitHub API.
 */
interface RawArtifact {
	id: number;
	name: string;
	size_in_bytes: number;
	archive_download_url: string;
	expired: boolean;
	created_at?: string | null;
	expires_at?: string | null;
}

/**
 * Raw artifact list response from GitHub API.
 */
interface RawArtifactList {
	total_count: number;
	artifacts: RawArtifact[];
}

/**
 * Options for downloading an artifact.
 */
export interface DownloadArtifactOptions {
	/** Repository owner (default: from `GITHUB_REPOSITORY`). */
	owner?: string;
	/** Repository name (default: from `GITHUB_REPOSITORY`). */
	repo?: string;
	/** Workflow run ID (default: `GITHUB_RUN_ID`). */
	runId?: number;
	/** AbortSignal for cancellation. */
	signal?: AbortSignal;
	/** Maximum bytes held in memory. */
	maxSize?: number;
}

function toWorkflowArtifact(raw: RawArtifact): WorkflowArtifact {
	return {
		id: raw.id,
		name: raw.name,
		sizeInBytes: raw.size_in_bytes,
		archiveDownloadUrl: raw.archive_download_url,
		expired: raw.expired,
		createdAt: raw.created_at ?? undefined,
		expiresAt: raw.expires_at ?? undefined,
	};
}

/**
 * List every artifact of a workflow run, following pagination.
 *
 * @param client - GitHub client
 * @param owner - Repository owner
 * @param repo - Repository name
 * @param runId - Workflow run ID
 * @param signal - AbortSignal for cancellation
 * @returns Artifacts in API order
 */
export async function listRunArtifacts(
	client: GitHubClient,
	owner: string,
	repo: string,
	runId: number,
	signal?: AbortSignal,
): Promise<WorkflowArtifact[]> {
	const base = `${client.apiUrl}/repos/${encodeURIComponent(owner)}/${encodeURIComponent(repo)}/actions/runs/${runId}/artifacts`;
	const artifacts: WorkflowArtifact[] = [];

	for (let page = 1; ; page++) {
		const url = `${base}?per_page=${PAGE_SIZE}&page=${page}`;

		let raw: RawArtifactList;
		try {
			raw = await fetchJson<RawArtifactList>(url, getRequestOptions(client, "application/vnd.github+json", signal));
		} catch (error) {
			handleGitHubError(error, `artifacts of run ${runId} on ${owner}/${repo}`);
		}

		artifacts.push(...raw.artifacts.map(toWorkflowArtifact));

		if (raw.artifacts.length < PAGE_SIZE || artifacts.length >= raw.total_count) {
			return artifacts;
		}
	}
}

/**
 * Resolve the short-lived download URL of an artifact's zip archive.
 *
 * @param client - GitHub client
 * @param owner - Repository owner
 * @param repo - Repository name
 * @param artifactId - Artifact ID
 * @param signal - AbortSignal for cancellation
 * @returns Absolute download URL
 * @throws NetworkError if the API does not answer with a redirect
 */
export async function getArtifactDownloadUrl(
	client: GitHubClient,
	owner: string,
	repo: string,
	artifactId: number,
	signal?: AbortSignal,
): Promise<string> {
	const url = `${client.apiUrl}/repos/${encodeURIComponent(owner)}/${encodeURIComponent(repo)}/actions/artifacts/${artifactId}/zip`;

	let response: Response;
	try {
		response = await fetchResponse(url, {
			...getRequestOptions(client, "application/vnd.github+json", signal),
			redirect: "manual",
		});
	} catch (error) {
		handleGitHubError(error, `artifact ${artifactId} on ${owner}/${repo}`);
	}

	await response.body?.cancel();

	const location = response.headers.get("location");
	if (!location) {
		throw new NetworkError(`Expected a redirect for artifact ${artifactId}, got HTTP ${response.status}`, {
			statusCode: response.status,
		});
	}

	return new URL(location, url).toString();
}

/**
 * Download a workflow-run artifact by name and extract all of its files.
 *
 * Entry names are used as stored in the artifact's zip archive.
 *
 * @param client - GitHub client
 * @param name - Artifact name
 * @param options - Download options
 * @returns Extracted files keyed by path
 * @throws ArtifactNotFoundError if the run has no artifact with that name
 */
export async function downloadArtifact(
	client: GitHubClient,
	name: string,
	options: DownloadArtifactOptions = {},
): Promise<ExtractionResult> {
	const fromEnvironment = parseRepository();
	const owner = options.owner ?? fromEnvironment.owner;
	const repo = options.repo ?? fromEnvironment.repo;
	const runId = options.runId ?? environmentRunId();
	const { signal } = options;

	const artifacts = await listRunArtifacts(client, owner, repo, runId, signal);
	const artifact = artifacts.find((candidate) => candidate.name === name);

	if (!artifact) {
		throw new ArtifactNotFoundError(
			`unable to find artifact named ${name} for run ${runId} on repository ${owner}/${repo}`,
			name,
		);
	}

	const downloadUrl = await getArtifactDownloadUrl(client, owner, repo, artifact.id, signal);
	client.logger.debug(`Downloading artifact ${name} from ${downloadUrl}`);

	const response = await fetchResponse(downloadUrl, getRequestOptions(client, "*/*", signal));

	return readArchiveResponse(response, {
		stripDepth: 0,
		include: matchAll,
		logger: client.logger,
		maxSize: options.maxSize,
		signal,
	});
}
