// app/page.tsx

'use client';

import { useEffect, useMemo, useState } from 'react';
import {
  CartesianGrid,
  Legend,
  Line,
  LineChart,
  ResponsiveContainer,
  Tooltip,
  XAxis,
  YAxis,
} from 'recharts';
import { chartPoints, chartTitle } from '@/lib/aggregator';
import type { Overview, PriceQueryResponse } from '@/lib/dashboard';
import { deviationCategory } from '@/lib/deviation';
import type { PctChangeSlot, PriceSeries, RainfallPeriod, RainfallRecord } from '@/lib/types';

type Tab = 'prices' | 'rainfall';

const PERIODS: RainfallPeriod[] = ['Daily', 'Weekly', 'Monthly', 'Cumulative'];
const SLOT_IDS: PctChangeSlot[] = ['threeWeeksAgo', 'twoWeeksAgo', 'previousWeek', 'latestWeek'];
const LINE_COLORS = ['#2980b9', '#c0392b', '#27ae60', '#8e44ad', '#d35400', '#16a085', '#2c3e50'];

async function getJson<T>(url: string): Promise<T> {
  const res = await fetch(url, { cache: 'no-store' });
  const contentType = res.headers.get('content-type');
  if (!contentType || !contentType.includes('application/json')) {
    throw new Error('Unexpected response from the server.');
  }
  const data: unknown = await res.json();
  if (!res.ok) {
    const message =
      typeof data === 'object' && data !== null && 'error' in data && typeof data.error === 'string'
        ? data.error
        : `Request failed (${res.status})`;
    throw new Error(message);
  }
  return data as T;
}

function priceQueryString(
  commodities: string[],
  start: string,
  end: string,
  normalize: boolean
): string {
  const params = new URLSearchParams();
  commodities.forEach((c) => params.append('commodity', c));
  params.set('start', start);
  params.set('end', end);
  if (normalize) params.set('normalize', '1');
  return params.toString();
}

export default function Page() {
  const [tab, setTab] = useState<Tab>('prices');

  return (
    <main>
      <h1>Commodity Price Evolution Dashboard</h1>
      <div className="tabs">
        <button className={tab === 'prices' ? 'active' : ''} onClick={() => setTab('prices')}>
          Retail prices
        </button>
        <button className={tab === 'rainfall' ? 'active' : ''} onClick={() => setTab('rainfall')}>
          Rainfall
        </button>
      </div>
      {tab === 'prices' ? <PricesTab /> : <RainfallTab />}
    </main>
  );
}

function PricesTab() {
  const [overview, setOverview] = useState<Overview | null>(null);
  const [selected, setSelected] = useState<string[]>([]);
  const [normalize, setNormalize] = useState(false);
  const [start, setStart] = useState('');
  const [end, setEnd] = useState('');
  const [result, setResult] = useState<PriceQueryResponse | null>(null);
  const [message, setMessage] = useState<string | null>(null);

  useEffect(() => {
    getJson<Overview>('/api/commodities')
      .then((o) => {
        setOverview(o);
        setSelected(o.defaultSelection);
        setStart(o.defaultWindow.start);
        setEnd(o.defaultWindow.end);
      })
      .catch((e: unknown) => setMessage(e instanceof Error ? e.message : 'Failed to load'));
  }, []);

  useEffect(() => {
    if (!overview || !start || !end) return;
    if (selected.length === 0) {
      setResult(null);
      return;
    }
    let cancelled = false;
    getJson<PriceQueryResponse>(`/api/prices?${priceQueryString(selected, start, end, normalize)}`)
      .then((r) => {
        if (!cancelled) {
          setResult(r);
          setMessage(null);
        }
      })
      .catch((e: unknown) => {
        if (!cancelled) setMessage(e instanceof Error ? e.message : 'Failed to load prices');
      });
    return () => {
      cancelled = true;
    };
  }, [overview, selected, start, end, normalize]);

  const toggle = (name: string) =>
    setSelected((prev) => (prev.includes(name) ? prev.filter((c) => c !== name) : [...prev, name]));

  if (!overview) {
    return <div className={`status ${message ? 'error' : ''}`}>{message ?? 'Loading...'}</div>;
  }

  return (
    <>
      {message && <div className="status error">{message}</div>}
      <div className="layout">
        <section className="panel wide">
          <div className="controls">
            {overview.commodities.map((c) => (
              <label key={c}>
                <input type="checkbox" checked={selected.includes(c)} onChange={() => toggle(c)} /> {c}
              </label>
            ))}
          </div>
          <div className="controls">
            <label>
              <input
                type="checkbox"
                checked={normalize}
                onChange={(e) => setNormalize(e.target.checked)}
              />{' '}
              Normalize prices to 100
            </label>
            <label>
              From{' '}
              <input
                type="date"
                value={start}
                min={overview.bounds.min}
                max={end}
                onChange={(e) => setStart(e.target.value)}
              />
            </label>
            <label>
              To{' '}
              <input
                type="date"
                value={end}
                min={start}
                max={overview.bounds.max}
                onChange={(e) => setEnd(e.target.value)}
              />
            </label>
            <a href={`/api/download-prices?${priceQueryString(selected, start, end, normalize)}`}>
              Download (.xlsx)
            </a>
          </div>
          <div>
            Selected date range: {start} to {end}
          </div>
          {result && selected.length > 0 && (
            <PriceChart title={chartTitle(selected)} series={result.series} />
          )}
        </section>

        <section className="panel narrow">
          <h3>Week-on-Week Momentum</h3>
          {result && <MomentumTable result={result} />}
        </section>
      </div>
    </>
  );
}

function PriceChart({ title, series }: { title: string; series: PriceSeries }) {
  const data = useMemo(() => chartPoints(series), [series]);
  const commodities = useMemo(() => [...new Set(series.map((r) => r.commodity))], [series]);

  return (
    <figure>
      <figcaption>{title}</figcaption>
      <div style={{ height: 360 }}>
        <ResponsiveContainer width="100%" height="100%">
          <LineChart data={data} margin={{ top: 10, right: 18, bottom: 10, left: 8 }}>
            <CartesianGrid strokeDasharray="3 3" />
            <XAxis dataKey="date" tick={{ fontSize: 12 }} minTickGap={24} />
            <YAxis tick={{ fontSize: 12 }} domain={['auto', 'auto']} />
            <Tooltip />
            <Legend verticalAlign="bottom" />
            {commodities.map((c, i) => (
              <Line
                key={c}
                type="monotone"
                dataKey={c}
                name={c}
                dot={false}
                strokeWidth={2}
                stroke={LINE_COLORS[i % LINE_COLORS.length]}
                connectNulls
              />
            ))}
          </LineChart>
        </ResponsiveContainer>
      </div>
    </figure>
  );
}

function MomentumTable({ result }: { result: PriceQueryResponse }) {
  if (result.pctChange.length === 0) {
    return <p>Not enough weekly data in the selected range.</p>;
  }
  return (
    <>
      <table>
        <thead>
          <tr>
            {result.columns.map((c) => (
              <th key={c.id}>
                {c.name[0]}
                <br />
                {c.name[1]}
              </th>
            ))}
          </tr>
        </thead>
        <tbody>
          {result.pctChange.map((row) => (
            <tr key={row.commodity}>
              <td>{row.commodity}</td>
              {SLOT_IDS.map((slot) => {
                const v = row[slot];
                return (
                  <td key={slot} className={v === null ? '' : v > 0 ? 'up' : v < 0 ? 'down' : ''}>
                    {v === null ? '' : v.toFixed(2)}
                  </td>
                );
              })}
            </tr>
          ))}
        </tbody>
      </table>
      {result.misaligned && (
        <p>Some commodities have gaps; their weeks differ from the column dates.</p>
      )}
    </>
  );
}

function RainfallTab() {
  const [period, setPeriod] = useState<RainfallPeriod>('Daily');
  const [records, setRecords] = useState<RainfallRecord[] | null>(null);
  const [message, setMessage] = useState<string | null>(null);

  useEffect(() => {
    let cancelled = false;
    setRecords(null);
    getJson<{ records: RainfallRecord[] }>(`/api/rainfall?period=${period}`)
      .then((data) => {
        if (!cancelled) {
          setRecords(data.records);
          setMessage(null);
        }
      })
      .catch((e: unknown) => {
        if (!cancelled) setMessage(e instanceof Error ? e.message : 'Failed to load rainfall');
      });
    return () => {
      cancelled = true;
    };
  }, [period]);

  return (
    <div className="layout">
      <section className="panel wide">
        <div className="controls">
          {PERIODS.map((p) => (
            <label key={p}>
              <input type="radio" checked={period === p} onChange={() => setPeriod(p)} /> {p}
            </label>
          ))}
        </div>
        {message && <div className="status error">{message}</div>}
        {!records && !message && <div className="status">Loading...</div>}
        {records && (
          <table>
            <thead>
              <tr>
                <th>State</th>
                <th>Actual (mm)</th>
                <th>Normal (mm)</th>
                <th>Departure (%)</th>
                <th>Category</th>
              </tr>
            </thead>
            <tbody>
              {records.map((r) => {
                const category = deviationCategory(r.deviationPct);
                return (
                  <tr key={r.state}>
                    <td>{r.state}</td>
                    <td>{r.actualMm ?? ''}</td>
                    <td>{r.normalMm ?? ''}</td>
                    <td>{r.deviationPct ?? ''}</td>
                    <td className={`cat-${category.toLowerCase().replace(/ /g, '-')}`}>{category}</td>
                  </tr>
                );
              })}
            </tbody>
          </table>
        )}
      </section>
    </div>
  );
}
