/**
 * GitHub module exports.
 */

export {
	type GitHubClientOptions,
	type GitHubClient,
	createGitHubClient,
	closeGitHubClient,
	getRequestOptions,
} from "./client.js";

export { type DownloadRepositoryFilesOptions, buildTarballUrl, downloadRepositoryFiles } from "./tarball.js";

export {
	type WorkflowArtifact,
	type DownloadArtifactOptions,
	listRunArtifacts,
	getArtifactDownloadUrl,
	downloadArtifact,
} from "./artifacts.js";
