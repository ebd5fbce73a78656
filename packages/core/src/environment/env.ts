/**
 * @title Workflow Environment Module
 * @description Accessors for the default environment of a GitHub Actions run.
 *
 * Every accessor reads `process.env` when called; nothing is cached, so a
 * value changed by an earlier step is seen by the next call.
 *
 * @module environment
 *
 * @see https://docs.github.com/en/actions/learn-github-actions/variables#default-environment-variables
 */

const DEFAULT_SERVER_URL = "https://github.com";
const DEFAULT_API_URL = "https://api.github.com";
const DEFAULT_GRAPHQL_URL = "https://api.github.com/graphql";

function githubEnv(name: string): string {
	return process.env[`GITHUB_${name}`] ?? "";
}

function githubEnvNumber(name: string): number {
	const value = githubEnv(name);
	return /^\d+$/.test(value) ? Number(value) : 0;
}

/** Name of the workflow being run. */
export function workflow(): string {
	return githubEnv("WORKFLOW");
}

/**
 * Unique number of the run within the repository. Unchanged when the run is
 * re-run. 0 when unset.
 */
export function runId(): number {
	return githubEnvNumber("RUN_ID");
}

/** Number of the run for this workflow, starting at 1. 0 when unset. */
export function runNumber(): number {
	return githubEnvNumber("RUN_NUMBER");
}

/** Identifier of the running action or step. */
export function action(): string {
	return githubEnv("ACTION");
}

/** True when running inside GitHub Actions. */
export function isActions(): boolean {
	return githubEnv("ACTIONS") === "true";
}

/** Person or app that started the workflow, e.g. `octocat`. */
export function actor(): string {
	return githubEnv("ACTOR");
}

/** Owner and repository name, e.g. `octocat/Hello-World`. */
export function repository(): string {
	return githubEnv("REPOSITORY");
}

/** Webhook event that triggered the workflow. */
export function eventName(): string {
	return githubEnv("EVENT_NAME");
}

/** Path of the file holding the webhook event payload. */
export function eventPath(): string {
	return githubEnv("EVENT_PATH");
}

/** Workspace directory on the runner. */
export function workspace(): string {
	return githubEnv("WORKSPACE");
}

/** Commit SHA that triggered the workflow. */
export function sha(): string {
	return githubEnv("SHA");
}

/** Branch or tag ref that triggered the workflow, e.g. `refs/heads/main`. */
export function ref(): string {
	return githubEnv("REF");
}

/** Head branch of a pull request from a fork. */
export function headRef(): string {
	return githubEnv("HEAD_REF");
}

/** Base branch of a pull request from a fork. */
export function baseRef(): string {
	return githubEnv("BASE_REF");
}

/** URL of the GitHub server. */
export function serverUrl(): string {
	return githubEnv("SERVER_URL") || DEFAULT_SERVER_URL;
}

/** URL of the REST API. */
export function apiUrl(): string {
	return githubEnv("API_URL") || DEFAULT_API_URL;
}

/** URL of the GraphQL API. */
export function graphqlUrl(): string {
	return githubEnv("GRAPHQL_URL") || DEFAULT_GRAPHQL_URL;
}

/**
 * Read an action input the way the runner exports it: `INPUT_` followed by
 * the upper-cased name with spaces replaced by underscores.
 *
 * @param name - Input name as declared in action.yml
 * @returns Trimmed value, or undefined when the input is unset or empty
 */
export function getInput(name: string): string | undefined {
	const value = process.env[`INPUT_${name.replace(/ /g, "_").toUpperCase()}`]?.trim();
	return value ? value : undefined;
}

/**
 * Owner and name of a repository.
 */
export interface RepositoryRef {
	owner: string;
	repo: string;
}

/**
 * Split an `owner/name` slug. Missing parts come back as empty strings.
 *
 * @param slug - Repository slug (default: `GITHUB_REPOSITORY`)
 * @returns Owner and name
 */
export function parseRepository(slug: string = repository()): RepositoryRef {
	const separator = slug.indexOf("/");
	if (separator === -1) {
		return { owner: slug, repo: "" };
	}
	return { owner: slug.slice(0, separator), repo: slug.slice(separator + 1) };
}
