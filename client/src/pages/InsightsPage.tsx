// =============================================================================
// pages/InsightsPage.tsx — AI Insights (/insights)
//
// Two sections:
//
//  A  Quick actions — Show Champions / Show At Risk list records directly;
//                     Engagement summary / Retention insights send a fixed
//                     question to POST /api/analyze
//  B  Custom question — free text → POST /api/analyze
//
// The model only ever sees the aggregate summary the server builds, never
// individual records. A degraded answer (no candidates, filtered, empty) comes
// back as 200 with its outcome kind and is shown as a notice, not an error.
// =============================================================================

import { useState } from 'react';
import type { FormEvent } from 'react';
import { analyze, fetchEmployees } from '../api/analytics';
import type { AnalysisResult, EmployeeRecord } from '../api/analytics';
import { toApiRequestError } from '../api/client';
import type { ApiRequestError } from '../api/client';
import { EmployeeTable } from '../components/dashboard/EmployeeTable';
import { ErrorState, PageHeader, Spinner } from '../components/ui';

const ENGAGEMENT_QUESTION = 'What is the overall employee engagement status and key factors affecting it?';
const RETENTION_QUESTION  = 'What factors might affect employee retention and what are your recommendations?';
const MAX_QUERY_LENGTH    = 2_000;

type Panel =
    | { kind: 'idle' }
    | { kind: 'loading'; title: string }
    | { kind: 'employees'; title: string; employees: EmployeeRecord[] }
    | { kind: 'analysis'; title: string; result: AnalysisResult }
    | { kind: 'error'; error: ApiRequestError };

// ─── Quick action button ──────────────────────────────────────────────────────

function QuickAction({ label, hint, onClick, disabled }: {
    label: string;
    hint: string;
    onClick: () => void;
    disabled: boolean;
}) {
    return (
        <button
            type="button"
            onClick={onClick}
            disabled={disabled}
            className="
                text-left rounded-xl border border-slate-800 bg-slate-900 p-4
                hover:border-indigo-500/40 hover:bg-indigo-500/5
                disabled:opacity-40 disabled:cursor-not-allowed transition-colors
            "
        >
            <p className="text-sm font-semibold text-slate-200">{label}</p>
            <p className="text-xs text-slate-500 mt-1">{hint}</p>
        </button>
    );
}

// ─── Result panel ─────────────────────────────────────────────────────────────

function AnalysisPanel({ title, result }: { title: string; result: AnalysisResult }) {
    const degraded = result.outcome !== 'ok';
    return (
        <section className="card space-y-3">
            <div className="flex items-center justify-between gap-3">
                <p className="section-label">{title}</p>
                <div className="flex gap-2 text-[10px]">
                    {result.cached && (
                        <span className="px-2 py-0.5 rounded-md border border-slate-700 text-slate-400">cached</span>
                    )}
                    {degraded && (
                        <span className="px-2 py-0.5 rounded-md border border-amber-500/30 text-amber-400">{result.outcome}</span>
                    )}
                </div>
            </div>
            <p className={`whitespace-pre-wrap text-sm leading-relaxed ${degraded ? 'text-amber-300' : 'text-slate-200'}`}>
                {result.analysis}
            </p>
        </section>
    );
}

// ─── Page ─────────────────────────────────────────────────────────────────────

export default function InsightsPage() {
    const [panel, setPanel] = useState<Panel>({ kind: 'idle' });
    const [query, setQuery] = useState('');
    const busy = panel.kind === 'loading';

    async function showQuadrant(title: string, quadrant: string) {
        setPanel({ kind: 'loading', title });
        try {
            const employees = await fetchEmployees(quadrant);
            setPanel({ kind: 'employees', title: `${title} (${employees.length})`, employees });
        } catch (e) {
            setPanel({ kind: 'error', error: toApiRequestError(e) });
        }
    }

    async function ask(title: string, question: string) {
        setPanel({ kind: 'loading', title });
        try {
            const result = await analyze(question);
            setPanel({ kind: 'analysis', title, result });
        } catch (e) {
            setPanel({ kind: 'error', error: toApiRequestError(e) });
        }
    }

    function handleSubmit(e: FormEvent) {
        e.preventDefault();
        const trimmed = query.trim();
        if (!trimmed) return;
        void ask('AI analysis', trimmed);
    }

    return (
        <>
            <PageHeader
                title="AI Insights"
                subtitle="Questions are answered from the aggregate summary only; no individual feedback is sent."
            />

            <section className="space-y-3 mb-8">
                <p className="section-label">Quick actions</p>
                <div className="grid grid-cols-1 sm:grid-cols-2 xl:grid-cols-4 gap-3">
                    <QuickAction
                        label="Show Champions"
                        hint="List every employee in the Champion quadrant."
                        disabled={busy}
                        onClick={() => void showQuadrant('Champion employees', 'Champion')}
                    />
                    <QuickAction
                        label="Show At Risk"
                        hint="List every employee in the At Risk quadrant."
                        disabled={busy}
                        onClick={() => void showQuadrant('At Risk employees', 'At Risk')}
                    />
                    <QuickAction
                        label="Engagement summary"
                        hint="Overall engagement status and its key factors."
                        disabled={busy}
                        onClick={() => void ask('Engagement analysis', ENGAGEMENT_QUESTION)}
                    />
                    <QuickAction
                        label="Retention insights"
                        hint="Retention risks and recommendations."
                        disabled={busy}
                        onClick={() => void ask('Retention analysis', RETENTION_QUESTION)}
                    />
                </div>
            </section>

            <form onSubmit={handleSubmit} className="card space-y-3 mb-8">
                <label htmlFor="insights-query" className="section-label block">Ask a custom question</label>
                <textarea
                    id="insights-query"
                    value={query}
                    onChange={e => setQuery(e.target.value)}
                    maxLength={MAX_QUERY_LENGTH}
                    rows={4}
                    placeholder="e.g. Which roles need the most attention, and why?"
                    className="
                        w-full px-3 py-2 rounded-lg resize-y
                        border border-slate-700 bg-slate-800
                        text-sm text-slate-200 placeholder:text-slate-600
                        focus:outline-none focus:border-indigo-500 focus:ring-2 focus:ring-indigo-500/20
                    "
                />
                <div className="flex items-center justify-between">
                    <span className="text-[10px] text-slate-600 tabular-nums">{query.length}/{MAX_QUERY_LENGTH}</span>
                    <button type="submit" disabled={busy || !query.trim()} className="btn-primary">
                        {busy && <Spinner className="w-4 h-4" />}
                        Analyze
                    </button>
                </div>
            </form>

            {panel.kind === 'loading' && (
                <div className="card flex items-center gap-3 text-sm text-slate-400">
                    <Spinner className="w-4 h-4" />
                    {panel.title}…
                </div>
            )}
            {panel.kind === 'error' && <ErrorState error={panel.error} />}
            {panel.kind === 'analysis' && <AnalysisPanel title={panel.title} result={panel.result} />}
            {panel.kind === 'employees' && (
                <section className="space-y-3">
                    <p className="section-label">{panel.title}</p>
                    <EmployeeTable employees={panel.employees} />
                </section>
            )}
        </>
    );
}
