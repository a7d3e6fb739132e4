import React from 'react';

import {
  ANALYSIS_TYPE_LABELS,
  DEFAULT_ANALYSIS_TYPE,
  type AnalysisType,
} from '../../../domains/analysis/domain/analysisTypes';
import type { ReportSummary } from '../../../domains/analysis/domain/entities/AnalysisReport';
import { formatBytes } from '../lib/format';
import type { Tool } from '../lib/tools';

import { Layout } from './Layout';

export interface IndexPageProps {
  tools: Tool[];
  selectedType?: AnalysisType;
  /** Previously submitted URL, echoed back after a failed submit */
  url?: string;
  error?: string;
  recentReports?: ReportSummary[];
}

export function IndexPage({
  tools,
  selectedType = DEFAULT_ANALYSIS_TYPE,
  url = '',
  error,
  recentReports = [],
}: IndexPageProps) {
  return (
    <Layout title='Analyze a website' scripts={['index']}>
      <section className='hero'>
        <h1>Analyze a website</h1>
        <p>Pick an analysis, enter a URL and get a report you can come back to.</p>
      </section>

      <section className='tool-grid' aria-label='Analysis types'>
        {tools.map(tool => (
          <button
            key={tool.type}
            type='button'
            className={tool.type === selectedType ? 'tool-card active' : 'tool-card'}
            data-tool={tool.type}
            data-loading-message={tool.loadingMessage}
          >
            <span className='tool-title'>{tool.title}</span>
            <span className='tool-description'>{tool.description}</span>
          </button>
        ))}
      </section>

      <section className='feature-lists'>
        {tools.map(tool => (
          <div
            key={tool.type}
            id={`${tool.type}-features`}
            className='feature-list'
            hidden={tool.type !== selectedType}
          >
            <h2>{tool.title}</h2>
            <ul>
              {tool.features.map(feature => <li key={feature}>{feature}</li>)}
            </ul>
          </div>
        ))}
      </section>

      <section className='analysis-form'>
        {error && (
          <div className='error-message' role='alert'>
            <p>{error}</p>
          </div>
        )}
        <form method='post' action='/analyze' noValidate>
          <input type='hidden' id='analysis_type' name='analysis_type' value={selectedType} />
          <label htmlFor='url'>Website URL</label>
          <div className='form-row'>
            <input
              type='text'
              id='url'
              name='url'
              placeholder='https://example.com'
              defaultValue={url}
              autoComplete='url'
            />
            <button type='submit'>Analyze</button>
          </div>
        </form>
      </section>

      {recentReports.length > 0 && (
        <section className='recent-reports'>
          <h2>Recent reports</h2>
          <table className='data-table'>
            <thead>
              <tr>
                <th>Report</th>
                <th>Type</th>
                <th>Created</th>
                <th>Size</th>
              </tr>
            </thead>
            <tbody>
              {recentReports.map(report => (
                <tr key={report.filename}>
                  <td><a href={`/result/${encodeURIComponent(report.filename)}`}>{report.filename}</a></td>
                  <td>{report.type === 'unknown' ? 'Unknown' : ANALYSIS_TYPE_LABELS[report.type]}</td>
                  <td>{report.createdAt}</td>
                  <td>{formatBytes(report.size)}</td>
                </tr>
              ))}
            </tbody>
          </table>
        </section>
      )}
    </Layout>
  );
}
