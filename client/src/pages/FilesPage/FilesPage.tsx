/**
 * FilesPage
 *
 * Demo of the two ways to anchor a press menu:
 * - A file table with one interaction for the whole table. The builder finds
 *   the row under the press and anchors the menu to that row.
 * - A "Hold for menu" panel whose menu is anchored to the exact press point.
 */

import { useCallback, useRef } from 'react';
import {
  autoWidth,
  createMenuConfiguration,
  usePressMenu,
  type Point,
  type Rect,
} from '../../components/PressMenu';
import { demoLogger } from '../../services/logger.service';
import { formatFileSize } from '../../utils/format';
import { MOCK_FILES, MOCK_VIDEOS, type FileItem } from './fileItems';
import { buildFileRowMenuItems, buildVideoMenuItems, type FileActions } from './fileMenus';
import './FilesPage.css';

// =============================================================================
// Table Geometry
// =============================================================================

/**
 * Row rect in the table's local (scrolled content) coordinates
 */
function rowRect(row: HTMLElement): Rect {
  return { x: row.offsetLeft, y: row.offsetTop, width: row.offsetWidth, height: row.offsetHeight };
}

/**
 * Row element under a table-local point
 */
export function rowAtPoint(table: HTMLElement, location: Point): HTMLElement | null {
  const rows = table.querySelectorAll<HTMLElement>('[data-row-index]');
  for (const row of Array.from(rows)) {
    const rect = rowRect(row);
    if (location.y >= rect.y && location.y < rect.y + rect.height) {
      return row;
    }
  }
  return null;
}

// =============================================================================
// Actions
// =============================================================================

const fileActions: FileActions = {
  download: (file) => demoLogger.info({ file: file.name }, `Downloading ${file.name}...`),
  share: (file) => demoLogger.info({ file: file.name }, `Sharing ${file.name}...`),
  confirmDelete: (file) => demoLogger.info({ file: file.name }, 'Show delete confirmation...'),
};

// =============================================================================
// Component
// =============================================================================

interface FilesPageProps {
  files?: readonly FileItem[];
}

export function FilesPage({ files = MOCK_FILES }: FilesPageProps) {
  const tableRef = useRef<HTMLDivElement>(null);
  const panelRef = useRef<HTMLDivElement>(null);

  const buildTableMenu = useCallback(
    (location: Point) => {
      const table = tableRef.current;
      if (!table) return null;

      const row = rowAtPoint(table, location);
      const file = row ? files[Number(row.dataset.rowIndex)] : undefined;
      if (!row || !file) return null;

      return createMenuConfiguration({
        items: buildFileRowMenuItems(file, fileActions),
        sourceRect: rowRect(row),
        sourceView: table,
        widthMode: autoWidth(),
      });
    },
    [files]
  );

  const buildPanelMenu = useCallback((location: Point) => {
    const panel = panelRef.current;
    if (!panel) return null;

    return createMenuConfiguration({
      items: buildVideoMenuItems(MOCK_VIDEOS, fileActions, () => demoLogger.info('Share tapped')),
      sourceRect: { x: location.x, y: location.y, width: 0, height: 0 },
      sourceView: panel,
      widthMode: autoWidth(),
    });
  }, []);

  usePressMenu(tableRef, buildTableMenu);
  usePressMenu(panelRef, buildPanelMenu);

  return (
    <div className="files-page">
      <div ref={panelRef} className="files-page__panel">
        <span className="files-page__panel-label">Hold for menu</span>
      </div>

      <div ref={tableRef} className="files-page__table" role="list">
        {files.map((file, index) => (
          <div
            key={file.id}
            className="files-page__row"
            role="listitem"
            data-row-index={index}
            onClick={() => demoLogger.info({ file: file.name }, `Selected file: ${file.name}`)}
          >
            <span
              className={`files-page__status files-page__status--${file.isReady ? 'ready' : 'pending'}`}
              aria-label={file.isReady ? 'Ready' : 'Pending'}
            >
              {file.isReady ? '✓' : '◷'}
            </span>
            <span className="files-page__text">
              <span className="files-page__name">{file.name}</span>
              <span className="files-page__size">{formatFileSize(file.sizeInBytes)}</span>
            </span>
            <span className="files-page__chevron" aria-hidden="true">
              ›
            </span>
          </div>
        ))}
      </div>
    </div>
  );
}
