const OWNER_PATTERN = /^[A-Za-z0-9](?:[A-Za-z0-9-]{0,38})$/;
const REPO_PATTERN = /^[A-Za-z0-9._-]{1,100}$/;

export function isValidOwner(owner: string): boolean {
  return OWNER_PATTERN.test(owner);
}

export function isValidRepoName(name: string): boolean {
  return REPO_PATTERN.test(name) && name !== '.' && name !== '..';
}

export function apiBaseForHost(host: string): string {
  return host === 'github.com' ? 'https://api.github.com' : `https://${host}/api/v3`;
}

export function buildGithubOwnerRepo(owner: string, repo: string): string {
  return `${owner}/${repo}`;
}

export function repoWebUrl(host: string, owner: string, repo: string): string {
  return `https://${host}/${owner}/${repo}`;
}

export function repoCloneUrl(host: string, owner: string, repo: string, token?: string): string {
  const auth = token ? `${token}@` : '';
  return `https://${auth}${host}/${owner}/${repo}.git`;
}

export function repoSshUrl(host: string, owner: string, repo: string): string {
  return `git@${host}:${owner}/${repo}.git`;
}

export function pullNumberFromUrl(url: string): number | undefined {
  const match = url.trim().match(/\/pull\/(\d+)\/?$/);
  return match ? Number(match[1]) : undefined;
}

/** Masks userinfo in any https URL inside `text` so tokens never reach logs. */
export function redactCredentials(text: string): string {
  return text.replace(/(https?:\/\/)[^@\s/]+@/g, '$1***@');
}
