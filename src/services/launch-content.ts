import type { LaunchConfig } from '../config/config.js';
import type { BranchRef, CommitSpec, PullRequestSpec, RequiredArtifact } from '../types/launch.js';

export interface BranchPlan {
  primary: BranchRef;
  feature: BranchRef;
}

export function planBranches(config: Pick<LaunchConfig, 'branches'>): BranchPlan {
  const primary: BranchRef = { name: config.branches.primary };
  return { primary, feature: { name: config.branches.feature, base: primary } };
}

export function componentLine(artifact: RequiredArtifact): string {
  return `- **\`${artifact.path}\`**: ${artifact.summary}`;
}

export function initialCommit(config: Pick<LaunchConfig, 'project' | 'artifacts'>): CommitSpec {
  const lines = [
    `Initial commit: ${config.project.title} with CI smoke test`,
    '',
    ...config.artifacts.map((a) => `- Add ${a.path}: ${a.summary}`),
  ];
  return {
    message: lines.join('\n'),
    paths: new Set(config.artifacts.map((a) => a.path)),
  };
}

export const DEVELOPMENT_SECTION_HEADING = '## Development';

export function developmentSection(config: Pick<LaunchConfig, 'artifacts'>): string {
  const entry = config.artifacts.find((a) => a.path.endsWith('.py'))?.path ?? 'analyze.py';
  const smoke = config.artifacts.find((a) => a.path.endsWith('.csv'))?.path ?? 'test_smoke.csv';
  const ci = config.artifacts.find((a) => a.path.startsWith('.github/workflows/'))?.path ?? '.github/workflows/ci.yml';
  return [
    '',
    DEVELOPMENT_SECTION_HEADING,
    '',
    '### Running Tests Locally',
    '',
    '```bash',
    '# Quick smoke test',
    `python ${entry} --input ${smoke} --output test_results.csv`,
    '```',
    '',
    '### CI Pipeline',
    '',
    'This repository uses GitHub Actions for continuous integration:',
    '- **Smoke tests** run on every push and PR',
    '- **Code quality checks** run alongside the tests',
    '',
    `See \`${ci}\` for details.`,
    '',
  ].join('\n');
}

export function followUpCommit(readmePath: string): CommitSpec {
  return {
    message: [
      'Add development and CI documentation section',
      '',
      '- Document how to run tests locally',
      '- Explain CI pipeline configuration',
      '- Link to workflow file for details',
    ].join('\n'),
    paths: new Set([readmePath]),
  };
}

export function readmeArtifact(config: Pick<LaunchConfig, 'artifacts'>): string {
  return config.artifacts.find((a) => /^readme(\.[a-z]+)?$/i.test(a.path))?.path ?? 'README.md';
}

export function pullRequestSpec(config: Pick<LaunchConfig, 'project' | 'artifacts' | 'branches'>): PullRequestSpec {
  const { primary, feature } = planBranches(config);
  const body = [
    '## Summary',
    '',
    `This PR introduces the **${config.project.title}** analysis pipeline with CI smoke testing.`,
    '',
    '### Key Components',
    '',
    ...config.artifacts.map(componentLine),
    '',
    `Ready for review and merge to \`${primary.name}\`.`,
  ].join('\n');
  return {
    title: `Add ${config.project.title} analysis pipeline`,
    body,
    head: feature,
    base: primary,
  };
}

/** Extracts the component paths listed in a pull request body. */
export function listedComponents(body: string): string[] {
  const out: string[] = [];
  for (const line of body.split('\n')) {
    const match = line.match(/^- \*\*`([^`]+)`\*\*:/);
    if (match) out.push(match[1]);
  }
  return out;
}
