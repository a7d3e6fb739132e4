/**
* Click-to-sort for result tables.
*
* Cells compare numerically when both parse as numbers, otherwise as
* lower-cased text. A column that is already in ascending order is sorted
* descending, anything else ascending, so repeated clicks alternate. The sort
* is stable, so rows with equal keys keep their current relative order.
*/

export type SortDirection = 'asc' | 'desc';

function cellText(row: HTMLTableRowElement, columnIndex: number): string {
  return row.cells[columnIndex]?.textContent?.trim() ?? '';
}

export function compareCells(a: string, b: string): number {
  const x = parseFloat(a);
  const y = parseFloat(b);
  if (!Number.isNaN(x) && !Number.isNaN(y)) {
    return x - y;
  }
  const left = a.toLowerCase();
  const right = b.toLowerCase();
  return left < right ? -1 : left > right ? 1 : 0;
}

export function sortTable(table: HTMLTableElement, columnIndex: number): SortDirection {
  const tbody = table.tBodies[0];
  if (!tbody) return 'asc';

  const rows = Array.from(tbody.rows);
  const compare = (a: HTMLTableRowElement, b: HTMLTableRowElement) =>
    compareCells(cellText(a, columnIndex), cellText(b, columnIndex));

  // A column of equal values counts as ascending, so it always reports desc
  const alreadyAscending = rows.slice(1).every((row, i) => compare(rows[i], row) <= 0);
  const direction: SortDirection = alreadyAscending ? 'desc' : 'asc';

  const sorted = [...rows].sort((a, b) => (direction === 'asc' ? compare(a, b) : compare(b, a)));
  for (const row of sorted) {
    tbody.appendChild(row);
  }

  table.querySelectorAll('th').forEach(th => th.classList.remove('sort-asc', 'sort-desc'));
  table.tHead?.rows[0]?.cells[columnIndex]?.classList.add(direction === 'asc' ? 'sort-asc' : 'sort-desc');

  return direction;
}

export function initTableSort(root: Document = document): void {
  root.querySelectorAll<HTMLTableElement>('table.sortable').forEach(table => {
    table.tHead?.querySelectorAll('th').forEach(th => {
      th.addEventListener('click', () => {
        sortTable(table, th.cellIndex);
      });
    });
  });
}
