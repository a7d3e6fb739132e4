import React from 'react';

import {
  type AnalysisPayload,
  type JsonValue,
  isJsonObject,
} from '../../../domains/analysis/domain/analysisTypes';
import { formatValue, humanizeKey, slugify } from '../lib/format';

interface ValueProps {
  value: JsonValue;
  path: string[];
}

/**
* Column names of a list of records, in first-seen order
*/
export function tableColumns(rows: readonly AnalysisPayload[]): string[] {
  const columns = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) columns.add(key);
  }
  return [...columns];
}

export function DataTable({ rows, path }: { rows: AnalysisPayload[]; path: string[] }) {
  const columns = tableColumns(rows);
  return (
    <table className='data-table sortable' id={`table-${slugify(path)}`}>
      <thead>
        <tr>
          {columns.map((column, index) => (
            <th key={column} data-column={index} title='Click to sort'>{humanizeKey(column)}</th>
          ))}
        </tr>
      </thead>
      <tbody>
        {rows.map((row, rowIndex) => (
          <tr key={rowIndex}>
            {columns.map(column => <td key={column}>{formatValue(row[column])}</td>)}
          </tr>
        ))}
      </tbody>
    </table>
  );
}

function ValueView({ value, path }: ValueProps) {
  if (Array.isArray(value)) {
    if (value.length === 0) {
      return <span className='empty'>None</span>;
    }
    const records = value.filter(isJsonObject);
    if (records.length === value.length) {
      return <DataTable rows={records} path={path} />;
    }
    return (
      <ul className='value-list'>
        {value.map((item, index) => <li key={index}>{formatValue(item)}</li>)}
      </ul>
    );
  }

  if (isJsonObject(value)) {
    const id = `details-${slugify(path)}`;
    return (
      <>
        <button type='button' className='expand-button' data-target={id} aria-controls={id}>
          Show details
        </button>
        <div id={id} className='collapsible'>
          <PayloadView payload={value} path={path} />
        </div>
      </>
    );
  }

  return <span className='value'>{formatValue(value)}</span>;
}

export interface PayloadViewProps {
  payload: AnalysisPayload;
  /** Key path from the report root, used for element ids */
  path?: string[];
  /** Top-level keys rendered elsewhere on the page */
  omit?: readonly string[];
}

/**
* Generic rendering of an analyzer result: scalars inline, lists of records as
* sortable tables, nested objects behind expand buttons.
*/
export function PayloadView({ payload, path = [], omit = [] }: PayloadViewProps) {
  const entries = Object.entries(payload).filter(([key]) => !omit.includes(key));
  if (entries.length === 0) {
    return <p className='empty'>No details.</p>;
  }
  return (
    <dl className='payload'>
      {entries.map(([key, value]) => (
        <div key={key} className='payload-entry'>
          <dt>{humanizeKey(key)}</dt>
          <dd><ValueView value={value} path={[...path, key]} /></dd>
        </div>
      ))}
    </dl>
  );
}
