/**
 * Capture Metadata Tests
 */
import { hostname } from 'node:os';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { collectCaptureMetadata, getGitCommit } from './capture-metadata.js';

const { revparse } = vi.hoisted(() => ({ revparse: vi.fn() }));

vi.mock('simple-git', () => ({
  default: vi.fn(() => ({ revparse })),
}));

describe('capture metadata', () => {
  beforeEach(() => {
    revparse.mockReset();
  });

  it('should read HEAD of the project repository', async () => {
    revparse.mockResolvedValueOnce('9fceb02d0ae598e95dc970b74767f19372d61af8');

    await expect(getGitCommit('/srv/shop')).resolves.toBe('9fceb02d0ae598e95dc970b74767f19372d61af8');
    expect(revparse).toHaveBeenCalledWith(['HEAD']);
  });

  it('should return null outside a repository', async () => {
    revparse.mockRejectedValueOnce(new Error('fatal: not a git repository'));

    await expect(getGitCommit('/srv/shop')).resolves.toBeNull();
  });

  it('should record the commit and the host name', async () => {
    revparse.mockResolvedValueOnce('');

    await expect(collectCaptureMetadata('/srv/shop')).resolves.toEqual({
      gitCommit: null,
      hostname: hostname(),
    });
  });
});
