import { describe, it, expect, beforeEach } from 'vitest';
import { BranchResolver, CREATE_NEW_BRANCH, normalizeBranchName } from '../../../src/sandbox/branch-resolver.js';
import { UserAbortError, ValidationError } from '../../../src/core/errors.js';
import { FakeGitClient } from '../../helpers/fake-git.js';
import { ScriptedPrompter, type ScriptedAnswers } from '../../helpers/fakes.js';

describe('normalizeBranchName', () => {
  it('should strip the remote prefix and whitespace', () => {
    expect(normalizeBranchName('origin/feature/x')).toBe('feature/x');
    expect(normalizeBranchName('  dev  ')).toBe('dev');
    expect(normalizeBranchName('upstream/dev')).toBe('upstream/dev');
    expect(normalizeBranchName('upstream/dev', 'upstream')).toBe('dev');
  });
});

describe('BranchResolver', () => {
  let git: FakeGitClient;

  beforeEach(() => {
    git = new FakeGitClient('/work/app', {
      branches: ['dev', 'feature/a'],
      remoteBranches: ['dev', 'release'],
    });
  });

  function resolver(answers: ScriptedAnswers = {}): { resolver: BranchResolver; prompter: ScriptedPrompter } {
    const prompter = new ScriptedPrompter(answers);
    return { resolver: new BranchResolver('/work/app', { git, prompter }), prompter };
  }

  it('should return an existing local branch without prompting', async () => {
    const { resolver: r, prompter } = resolver();
    expect(await r.resolve('dev')).toBe('dev');
    expect(prompter.asked).toEqual([]);
    expect(git.calls).toEqual([]);
  });

  it('should create a tracking branch for a remote-only branch', async () => {
    const { resolver: r, prompter } = resolver();
    expect(await r.resolve('origin/release')).toBe('release');
    expect(git.calls).toEqual(['branch --track release origin/release']);
    expect(prompter.asked).toEqual([]);
  });

  it('should create a missing branch after confirmation', async () => {
    const { resolver: r, prompter } = resolver({ confirms: [true] });
    expect(await r.resolve('new-thing')).toBe('new-thing');
    expect(prompter.asked).toEqual(["Branch 'new-thing' does not exist. Create it?"]);
    expect(git.calls).toEqual(['branch new-thing']);
  });

  it('should create a missing branch from the base ref', async () => {
    const { resolver: r, prompter } = resolver({ confirms: [true] });
    expect(await r.resolve('hotfix', 'v1.2.0')).toBe('hotfix');
    expect(prompter.asked).toEqual(["Branch 'hotfix' does not exist. Create it from 'v1.2.0'?"]);
    expect(git.calls).toEqual(['branch hotfix v1.2.0']);
  });

  it('should abort when creation is declined', async () => {
    const { resolver: r } = resolver({ confirms: [false] });
    await expect(r.resolve('nope')).rejects.toBeInstanceOf(UserAbortError);
    expect(git.branches.has('nope')).toBe(false);
  });

  it('should reject an empty name', async () => {
    const { resolver: r } = resolver();
    await expect(r.ensure('   ')).rejects.toBeInstanceOf(ValidationError);
  });

  it('should offer local branches except the current one, then remote-only ones', async () => {
    const { resolver: r, prompter } = resolver({ selections: ['feature/a'] });
    expect(await r.resolve()).toBe('feature/a');
    expect(prompter.offered[0].map(c => c.value)).toEqual([
      CREATE_NEW_BRANCH,
      'dev',
      'feature/a',
      'origin/release',
    ]);
  });

  it('should strip the remote from a picked remote branch', async () => {
    const { resolver: r } = resolver({ selections: ['origin/release'] });
    expect(await r.resolve()).toBe('release');
    expect(git.calls).toEqual(['branch --track release origin/release']);
  });

  it('should ask for a name when creating a new branch from the picker', async () => {
    const { resolver: r, prompter } = resolver({ selections: [CREATE_NEW_BRANCH], inputs: ['spike'], confirms: [true] });
    expect(await r.resolve()).toBe('spike');
    expect(prompter.asked).toEqual([
      'Select a branch:',
      'Enter a new branch name',
      "Branch 'spike' does not exist. Create it?",
    ]);
  });

  it('should read a plain name without a terminal', async () => {
    const { resolver: r, prompter } = resolver({ interactive: false, inputs: ['dev'] });
    expect(await r.resolve()).toBe('dev');
    expect(prompter.asked).toEqual(['Enter a branch name']);
  });
});
