/**
 * Demo file data for the Files page.
 */

export interface FileItem {
  id: string;
  name: string;
  sizeInBytes: number;
  isReady: boolean;
  isShared: boolean;
}

function file(id: string, name: string, sizeInBytes: number, isReady = false, isShared = false): FileItem {
  return { id, name, sizeInBytes, isReady, isShared };
}

export const MOCK_FILES: readonly FileItem[] = [
  file('report', 'Report.pdf', 1_234_567, true, true),
  file('presentation', 'Presentation.pptx', 8_192_000, true, false),
  file('photo', 'Photo.jpg', 345_678, false, false),
  file('archive', 'Archive.zip', 25_000_000, true, true),
  file('video', 'Video.mp4', 120_000_000, false, false),
];

export const MOCK_VIDEOS: readonly FileItem[] = [
  file('video-1', 'Video 1', 2_500_000, true),
  file('video-2', 'Video 2', 15_700_000, false),
];
