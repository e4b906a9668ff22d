import type { AzureDevOpsConfig } from "../types.js";

export const API_VERSION = "7.0";

/** Accepts an organization as a bare name ("my-org") or a full URL. */
export function organizationUrl(organization: string): string {
  const org = organization.trim().replace(/\/+$/, "");
  if (/^https?:\/\//.test(org)) return org;
  return `https://dev.azure.com/${org.replace(/^\/+/, "")}`;
}

export function buildApiUrl(
  config: Pick<AzureDevOpsConfig, "organization" | "project">,
  repoId: string,
  ...pathSegments: Array<string | number>
): string {
  const base = `${organizationUrl(config.organization)}/${config.project}/_apis/git/repositories/${repoId}`;
  return `${base}/${pathSegments.join("/")}?api-version=${API_VERSION}`;
}

/** Web URL of the pull request; discussion links hang off it. */
export function buildPrBaseUrl(
  config: Pick<AzureDevOpsConfig, "organization" | "project" | "repository">,
  prId: number,
): string {
  return `${organizationUrl(config.organization)}/${config.project}/_git/${config.repository}/pullRequest/${prId}`;
}

export function buildDiscussionUrl(baseUrl: string, threadId: number, commentId: number): string {
  return `${baseUrl}?discussionId=${threadId}&commentId=${commentId}`;
}
