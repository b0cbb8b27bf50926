/**
 * @fileoverview Test helpers for lintboard tests
 */

export {
  createTempWorkspace,
  cleanupWorkspace,
  createTestFile,
  createWorkspaceWithFiles,
} from './workspace.js';

export {
  FakeGitRunner,
  porcelain,
  type FakeCall,
  type FakeResponse,
  type PorcelainLine,
} from './fake_git.js';
