/**
 * Files Page Menu Builder Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { buildFileRowMenuItems, buildVideoMenuItems, type FileActions } from '../fileMenus';
import { MOCK_FILES, MOCK_VIDEOS, type FileItem } from '../fileItems';
import { BADGE_COLORS } from '../../../components/PressMenu';
import { SYSTEM_BLUE, SYSTEM_GRAY, SYSTEM_RED } from '../../../components/PressMenu/constants';

function createActions(): FileActions {
  return {
    download: vi.fn(),
    share: vi.fn(),
    confirmDelete: vi.fn(),
  };
}

const sharedReadyFile: FileItem = {
  id: 'report',
  name: 'Report.pdf',
  sizeInBytes: 1_234_567,
  isReady: true,
  isShared: true,
};

const privatePendingFile: FileItem = {
  id: 'photo',
  name: 'Photo.jpg',
  sizeInBytes: 345_678,
  isReady: false,
  isShared: false,
};

// =============================================================================
// buildFileRowMenuItems
// =============================================================================

describe('buildFileRowMenuItems', () => {
  it('builds Download, Share and Delete in order', () => {
    const items = buildFileRowMenuItems(sharedReadyFile, createActions());
    expect(items.map((item) => item.title)).toEqual(['Download', 'Share', 'Delete']);
  });

  it('shows a ready file with a ready badge and its size', () => {
    const [download] = buildFileRowMenuItems(sharedReadyFile, createActions());

    expect(download?.badge).toBe('ready');
    expect(download?.statusText).toBe('Ready');
    expect(download?.statusColor).toBe(BADGE_COLORS.ready);
    expect(download?.detail).toBe('1.2 MB');
    expect(download?.detailColor).toBe(SYSTEM_GRAY);
  });

  it('shows a pending file with a pending badge', () => {
    const [download] = buildFileRowMenuItems(privatePendingFile, createActions());

    expect(download?.badge).toBe('pending');
    expect(download?.statusText).toBe('Pending');
    expect(download?.statusColor).toBe(BADGE_COLORS.pending);
    expect(download?.detail).toBe('346 KB');
  });

  it('marks shared files as public', () => {
    const [, sharedShare] = buildFileRowMenuItems(sharedReadyFile, createActions());
    const [, privateShare] = buildFileRowMenuItems(privatePendingFile, createActions());

    expect(sharedShare?.statusText).toBe('Public');
    expect(sharedShare?.statusColor).toBe(SYSTEM_BLUE);
    expect(privateShare?.statusText).toBeUndefined();
  });

  it('marks delete as permanent', () => {
    const [, , remove] = buildFileRowMenuItems(sharedReadyFile, createActions());

    expect(remove?.statusText).toBe('Permanent');
    expect(remove?.statusColor).toBe(SYSTEM_RED);
    expect(remove?.detail).toBeUndefined();
  });

  it('routes each item to its action with the file', () => {
    const actions = createActions();
    const items = buildFileRowMenuItems(sharedReadyFile, actions);

    for (const item of items) {
      item.action();
    }

    expect(actions.download).toHaveBeenCalledWith(sharedReadyFile);
    expect(actions.share).toHaveBeenCalledWith(sharedReadyFile);
    expect(actions.confirmDelete).toHaveBeenCalledWith(sharedReadyFile);
  });
});

// =============================================================================
// buildVideoMenuItems
// =============================================================================

describe('buildVideoMenuItems', () => {
  it('lists every video followed by Share', () => {
    const items = buildVideoMenuItems(MOCK_VIDEOS, createActions(), vi.fn());

    expect(items.map((item) => item.title)).toEqual(['Video 1', 'Video 2', 'Share']);
    expect(items.map((item) => item.badge)).toEqual(['ready', 'pending', undefined]);
    expect(items.map((item) => item.detail)).toEqual(['2.5 MB', '15.7 MB', undefined]);
  });

  it('downloads the tapped video and shares from the last row', () => {
    const actions = createActions();
    const onShare = vi.fn();
    const items = buildVideoMenuItems(MOCK_VIDEOS, actions, onShare);

    items[1]?.action();
    items[2]?.action();

    expect(actions.download).toHaveBeenCalledWith(MOCK_VIDEOS[1]);
    expect(onShare).toHaveBeenCalledTimes(1);
  });
});

describe('MOCK_FILES', () => {
  it('has unique ids', () => {
    const ids = new Set(MOCK_FILES.map((file) => file.id));
    expect(ids.size).toBe(MOCK_FILES.length);
  });
});
