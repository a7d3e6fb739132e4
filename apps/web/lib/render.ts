import type { ReactElement } from 'react';
import { renderToStaticMarkup } from 'react-dom/server';

/**
* Render a page component to a complete HTML document
*/
export function renderPage(element: ReactElement): string {
  return `<!DOCTYPE html>${renderToStaticMarkup(element)}`;
}
