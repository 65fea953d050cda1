import { describe, it, expect } from 'vitest';
import {
  benchmarkNameFromPath,
  benchmarkTargetFromPath,
  benchmarkRepoUrl,
  classifyResultsPath,
  expectedSubmoduleUrl,
  isResultsUpdate,
  resultsPath,
  sameRepoUrl,
} from '../src/layout';

describe('results layout', () => {
  it('builds rule and ruleset result paths', () => {
    expect(resultsPath('rule', 'TDD', 'python')).toBe('rules/TDD/python/RESULTS.md');
    expect(resultsPath('ruleset', 'core', 'typescript')).toBe(
      'rulesets/core/typescript/RESULTS.md'
    );
  });

  it('classifies conventional paths', () => {
    expect(classifyResultsPath('rulesets/core/typescript/RESULTS.md')).toEqual({
      kind: 'ruleset',
      name: 'core',
      language: 'typescript',
      path: 'rulesets/core/typescript/RESULTS.md',
    });
    expect(classifyResultsPath('rules\\TDD\\python\\RESULTS.md')).toEqual({
      kind: 'rule',
      name: 'TDD',
      language: 'python',
      path: 'rules/TDD/python/RESULTS.md',
    });
  });

  it('rejects paths off the convention', () => {
    expect(classifyResultsPath('rules/TDD/RESULTS.md')).toBeNull();
    expect(classifyResultsPath('rules/TDD/python/results.md')).toBeNull();
    expect(classifyResultsPath('rules/.hidden/python/RESULTS.md')).toBeNull();
    expect(classifyResultsPath('docs/TDD/python/RESULTS.md')).toBeNull();
    expect(classifyResultsPath('rules/TDD/python/extra/RESULTS.md')).toBeNull();
  });
});

describe('submodule mapping', () => {
  it('maps benchmark submodules to their repositories', () => {
    expect(benchmarkRepoUrl('TDD')).toBe(
      'https://github.com/CursorCult/_benchmark_TDD.git'
    );
    expect(expectedSubmoduleUrl('benchmarks/TDD', 'acme')).toBe(
      'https://github.com/acme/_benchmark_TDD.git'
    );
    expect(expectedSubmoduleUrl('_metrics')).toBe(
      'https://github.com/CursorCult/_metrics.git'
    );
    expect(expectedSubmoduleUrl('vendor/lib')).toBeNull();
  });

  it('extracts benchmark names from direct children only', () => {
    expect(benchmarkNameFromPath('benchmarks/TDD/')).toBe('TDD');
    expect(benchmarkNameFromPath('benchmarks/a/b')).toBeNull();
    expect(benchmarkNameFromPath('benchmarks/')).toBeNull();
    expect(benchmarkNameFromPath('_metrics')).toBeNull();
  });

  it('keeps nested paths below benchmarks/ as targets', () => {
    expect(benchmarkTargetFromPath('benchmarks/a/b')).toBe('a/b');
    expect(benchmarkTargetFromPath('benchmarks/TDD/')).toBe('TDD');
    expect(benchmarkTargetFromPath('benchmarks/')).toBeNull();
  });

  it('compares repository URLs loosely', () => {
    expect(sameRepoUrl('https://github.com/A/b.git/', 'https://github.com/a/b')).toBe(true);
    expect(sameRepoUrl('https://github.com/a/b', 'https://github.com/a/c')).toBe(false);
  });
});

describe('isResultsUpdate', () => {
  it('matches RESULTS.md under the named rule or ruleset', () => {
    expect(isResultsUpdate('rules/TDD/python/RESULTS.md', 'TDD')).toBe(true);
    expect(isResultsUpdate('rulesets/TDD/go/RESULTS.md', 'TDD')).toBe(true);
    expect(isResultsUpdate('rules/TDDX/python/RESULTS.md', 'TDD')).toBe(false);
    expect(isResultsUpdate('rules/TDD/python/notes.md', 'TDD')).toBe(false);
  });

  it('matches any results file when no name is given', () => {
    expect(isResultsUpdate('rules/Other/go/RESULTS.md')).toBe(true);
    expect(isResultsUpdate('docs/RESULTS.md')).toBe(false);
  });
});
