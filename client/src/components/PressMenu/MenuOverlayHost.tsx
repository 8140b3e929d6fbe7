/**
 * Mounts a presentation in its own React root on the anchor document's body,
 * so the popup sits above the host app regardless of where the anchor lives.
 * The root and its node are removed as soon as the presentation is disposed.
 */

import { createRoot } from 'react-dom/client';
import { PressMenuOverlay } from './PressMenuOverlay';
import type { MenuPresentation } from './MenuPresentation';

export type MenuPresenter = (presentation: MenuPresentation) => void;

export const mountMenuOverlay: MenuPresenter = (presentation) => {
  const doc = presentation.configuration.sourceView.ownerDocument;
  const host = doc.createElement('div');
  host.className = 'press-menu-host';
  doc.body.appendChild(host);

  const root = createRoot(host);
  presentation.onDispose(() => {
    root.unmount();
    host.remove();
  });
  root.render(<PressMenuOverlay presentation={presentation} />);
};
