/**
 * Menu item builders for the Files page.
 */

import {
  BADGE_COLORS,
  createMenuItem,
  type MenuItem,
} from '../../components/PressMenu';
import { SYSTEM_BLUE, SYSTEM_GRAY, SYSTEM_RED } from '../../components/PressMenu/constants';
import { formatFileSize } from '../../utils/format';
import type { FileItem } from './fileItems';

export interface FileActions {
  download: (file: FileItem) => void;
  share: (file: FileItem) => void;
  confirmDelete: (file: FileItem) => void;
}

function readinessFields(file: FileItem) {
  const badge = file.isReady ? 'ready' : 'pending';
  return {
    badge,
    statusText: file.isReady ? 'Ready' : 'Pending',
    statusColor: BADGE_COLORS[badge],
    detail: formatFileSize(file.sizeInBytes),
    detailColor: SYSTEM_GRAY,
  } as const;
}

/**
 * Download / Share / Delete for one table row
 */
export function buildFileRowMenuItems(file: FileItem, actions: FileActions): MenuItem[] {
  return [
    createMenuItem({
      ...readinessFields(file),
      title: 'Download',
      action: () => actions.download(file),
    }),
    createMenuItem({
      title: 'Share',
      statusText: file.isShared ? 'Public' : undefined,
      statusColor: SYSTEM_BLUE,
      action: () => actions.share(file),
    }),
    createMenuItem({
      title: 'Delete',
      statusText: 'Permanent',
      statusColor: SYSTEM_RED,
      action: () => actions.confirmDelete(file),
    }),
  ];
}

/**
 * One row per video plus a trailing Share
 */
export function buildVideoMenuItems(
  videos: readonly FileItem[],
  actions: Pick<FileActions, 'download'>,
  onShare: () => void
): MenuItem[] {
  const items = videos.map((video) =>
    createMenuItem({
      ...readinessFields(video),
      title: video.name,
      action: () => actions.download(video),
    })
  );

  items.push(createMenuItem({ title: 'Share', action: onShare }));
  return items;
}
