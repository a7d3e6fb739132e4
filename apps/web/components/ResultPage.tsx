import React from 'react';

import {
  ANALYSIS_TYPE_LABELS,
  type AnalysisPayload,
  type AnalysisType,
  isJsonObject,
  numberField,
  stringListField,
} from '../../../domains/analysis/domain/analysisTypes';
import { analysisTypeForResultKey, ratingForScore } from '../../../domains/analysis/domain/comprehensive';
import { humanizeKey } from '../lib/format';

import { Layout } from './Layout';
import { PayloadView } from './PayloadView';

export interface ResultPageProps {
  filename: string;
  type: AnalysisType;
  url: string;
  /** Display timestamp, YYYY-MM-DD HH:mm:ss */
  createdAt: string;
  payload: AnalysisPayload;
}

function ratingClass(score: number): string {
  return `rating-${ratingForScore(score).toLowerCase().replace(/\s+/g, '-')}`;
}

function sectionLabel(key: string): string {
  const type = analysisTypeForResultKey(key);
  return type ? ANALYSIS_TYPE_LABELS[type] : humanizeKey(key);
}

function ScoreCard({ label, score, rating }: { label: string; score: number; rating?: string }) {
  return (
    <div className={`score-card ${ratingClass(score)}`}>
      <span className='score-label'>{label}</span>
      <span className='score-value'>{score}</span>
      {rating && <span className='score-rating'>{rating}</span>}
    </div>
  );
}

function Recommendations({ items }: { items: string[] }) {
  if (items.length === 0) return null;
  return (
    <section className='recommendations'>
      <h2>Recommendations</h2>
      <ol>
        {items.map(item => <li key={item}>{item}</li>)}
      </ol>
    </section>
  );
}

/**
* Top-level numeric fields named like scores, in payload order
*/
export function scoreFields(payload: AnalysisPayload): Array<[string, number]> {
  const scores: Array<[string, number]> = [];
  for (const key of Object.keys(payload)) {
    const value = numberField(payload, key);
    if (value !== undefined && /score$/i.test(key)) scores.push([key, value]);
  }
  return scores;
}

function SingleResult({ payload }: { payload: AnalysisPayload }) {
  const scores = scoreFields(payload);
  return (
    <>
      {scores.length > 0 && (
        <section className='score-summary'>
          {scores.map(([key, score]) => <ScoreCard key={key} label={humanizeKey(key)} score={score} />)}
        </section>
      )}
      <Recommendations items={stringListField(payload, 'recommendations')} />
      <section className='details'>
        <h2>Details</h2>
        <PayloadView payload={payload} omit={['recommendations', ...scores.map(([key]) => key)]} />
      </section>
    </>
  );
}

function ComprehensiveResultView({ payload }: { payload: AnalysisPayload }) {
  const score = numberField(payload, 'comprehensiveScore') ?? 0;
  const rating = payload['comprehensiveRating'];
  const detailedValue = payload['detailedResults'];
  const failuresValue = payload['failures'];
  const detailed: AnalysisPayload = isJsonObject(detailedValue) ? detailedValue : {};
  const failures: AnalysisPayload = isJsonObject(failuresValue) ? failuresValue : {};
  const failureEntries = Object.entries(failures);

  return (
    <>
      <section className='score-summary'>
        <ScoreCard
          label='Overall score'
          score={score}
          rating={typeof rating === 'string' ? rating : ratingForScore(score)}
        />
      </section>

      <Recommendations items={stringListField(payload, 'recommendations')} />

      <section className='section-nav'>
        <h2>Detailed results</h2>
        <div className='section-buttons'>
          {Object.keys(detailed).map(key => (
            <button key={key} type='button' className='section-toggle' data-section={`${key}-details`}>
              {sectionLabel(key)}
            </button>
          ))}
        </div>
      </section>

      {Object.entries(detailed).map(([key, value]) => (
        <section key={key} id={`${key}-details`} className='detailed-section' hidden>
          <h3>{sectionLabel(key)}</h3>
          {isJsonObject(value)
            ? <PayloadView payload={value} path={[key]} />
            : <p className='empty'>No details.</p>}
        </section>
      ))}

      {failureEntries.length > 0 && (
        <section className='failures'>
          <h2>Analyses that failed</h2>
          <ul>
            {failureEntries.map(([key, message]) => (
              <li key={key}><strong>{sectionLabel(key)}:</strong> {typeof message === 'string' ? message : ''}</li>
            ))}
          </ul>
        </section>
      )}
    </>
  );
}

export function ResultPage({ filename, type, url, createdAt, payload }: ResultPageProps) {
  const label = ANALYSIS_TYPE_LABELS[type];
  return (
    <Layout title={`${label} report`} scripts={['result']}>
      <section className='result-header'>
        <h1>{label} report</h1>
        {url && <p className='result-url'>URL: <a href={url} rel='noopener noreferrer'>{url}</a></p>}
        <p className='result-date'>Created: {createdAt}</p>
        <div className='result-actions'>
          <button type='button' id='print-results'>Print</button>
          <a className='button' href={`/download/${encodeURIComponent(filename)}`}>Download JSON</a>
          <a className='button secondary' href='/'>New analysis</a>
        </div>
      </section>

      {type === 'comprehensive'
        ? <ComprehensiveResultView payload={payload} />
        : <SingleResult payload={payload} />}
    </Layout>
  );
}
