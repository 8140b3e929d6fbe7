/**
 * Press Menu demo application.
 */

import { FilesPage } from './pages/FilesPage/FilesPage';

export default function App() {
  return <FilesPage />;
}
