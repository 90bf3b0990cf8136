// pages/OverviewPage.tsx — headline numbers and charts (/overview).
//
// Layout (top → bottom):
//  ┌─ Header (title + Reload data) ──────────────────────────────┐
//  ├─ KPI tiles: total, average (+ hint), Champions, At Risk ─────┤
//  └─ Quadrant donut │ Sentiment-by-role bars ────────────────────┘

import { useState } from 'react';
import toast from 'react-hot-toast';
import { reloadData } from '../api/analytics';
import { toApiRequestError } from '../api/client';
import { useSummary } from '../hooks/useAnalytics';
import { StatCard } from '../components/dashboard/StatCard';
import { QuadrantChart } from '../components/dashboard/QuadrantChart';
import { RoleSentimentChart } from '../components/dashboard/RoleSentimentChart';
import { ErrorState, PageHeader, Skeleton, Spinner } from '../components/ui';
import { countFor, sentimentHint } from '../lib/format';

// ─── Icons ────────────────────────────────────────────────────────────────────

const RefreshIcon = () => (
    <svg viewBox="0 0 24 24" fill="none" stroke="currentColor" strokeWidth="2" strokeLinecap="round" strokeLinejoin="round" className="w-4 h-4" aria-hidden="true">
        <polyline points="23 4 23 10 17 10" />
        <polyline points="1 20 1 14 7 14" />
        <path d="M3.51 9a9 9 0 0 1 14.85-3.36L23 10M1 14l4.64 4.36A9 9 0 0 0 20.49 15" />
    </svg>
);

const PeopleIcon = (
    <svg viewBox="0 0 24 24" fill="none" stroke="currentColor" strokeWidth="2" className="w-5 h-5" aria-hidden="true">
        <path d="M17 21v-2a4 4 0 0 0-4-4H5a4 4 0 0 0-4 4v2" /><circle cx="9" cy="7" r="4" />
        <path d="M23 21v-2a4 4 0 0 0-3-3.87M16 3.13a4 4 0 0 1 0 7.75" />
    </svg>
);

const SmileIcon = (
    <svg viewBox="0 0 24 24" fill="none" stroke="currentColor" strokeWidth="2" className="w-5 h-5" aria-hidden="true">
        <circle cx="12" cy="12" r="10" /><path d="M8 14s1.5 2 4 2 4-2 4-2" />
        <line x1="9" y1="9" x2="9.01" y2="9" /><line x1="15" y1="9" x2="15.01" y2="9" />
    </svg>
);

const TrophyIcon = (
    <svg viewBox="0 0 24 24" fill="none" stroke="currentColor" strokeWidth="2" className="w-5 h-5" aria-hidden="true">
        <path d="M8 21h8M12 17v4M7 4h10v5a5 5 0 0 1-10 0V4z" /><path d="M17 5h3v2a3 3 0 0 1-3 3M7 5H4v2a3 3 0 0 0 3 3" />
    </svg>
);

const AlertIcon = (
    <svg viewBox="0 0 24 24" fill="none" stroke="currentColor" strokeWidth="2" className="w-5 h-5" aria-hidden="true">
        <path d="M10.29 3.86L1.82 18a2 2 0 0 0 1.71 3h16.94a2 2 0 0 0 1.71-3L13.71 3.86a2 2 0 0 0-3.42 0z" />
        <line x1="12" y1="9" x2="12" y2="13" /><line x1="12" y1="17" x2="12.01" y2="17" />
    </svg>
);

// ─── Skeleton ─────────────────────────────────────────────────────────────────

function OverviewSkeleton() {
    return (
        <div className="space-y-6">
            <div className="grid grid-cols-1 sm:grid-cols-2 xl:grid-cols-4 gap-4">
                {[0, 1, 2, 3].map(i => <Skeleton key={i} className="h-40" />)}
            </div>
            <div className="grid grid-cols-1 lg:grid-cols-2 gap-4">
                {[0, 1].map(i => <Skeleton key={i} className="h-80" />)}
            </div>
        </div>
    );
}

// ─── Page ─────────────────────────────────────────────────────────────────────

export default function OverviewPage() {
    const { data: summary, loading, error, refetch } = useSummary();
    const [reloading, setReloading] = useState(false);

    async function handleReload() {
        setReloading(true);
        try {
            const result = await reloadData();
            toast.success(
                result.skipped > 0
                    ? `${result.message} ${result.skipped} malformed rows skipped.`
                    : result.message,
            );
        } catch (e) {
            toast.error(toApiRequestError(e).message);
        } finally {
            setReloading(false);
            refetch();
        }
    }

    const reloadButton = (
        <button type="button" onClick={() => void handleReload()} disabled={reloading} className="btn-primary">
            {reloading ? <Spinner className="w-4 h-4" /> : <RefreshIcon />}
            Reload data
        </button>
    );

    return (
        <>
            <PageHeader
                title="Overview"
                subtitle="Engagement at a glance, recomputed from the current record set."
                actions={reloadButton}
            />

            {loading && !summary && <OverviewSkeleton />}
            {error && <ErrorState error={error} onRetry={refetch} />}

            {summary && (
                <div className="space-y-6">
                    <div className="grid grid-cols-1 sm:grid-cols-2 xl:grid-cols-4 gap-4">
                        <StatCard
                            label="Total employees"
                            value={summary.total_employees}
                            icon={PeopleIcon}
                            accent="from-indigo-500 to-indigo-700"
                        />
                        <StatCard
                            label="Average sentiment"
                            value={summary.average_sentiment}
                            decimals={1}
                            suffix="%"
                            icon={SmileIcon}
                            accent="from-sky-500 to-sky-700"
                            hint={{
                                text: sentimentHint(summary.average_sentiment),
                                tone: sentimentHint(summary.average_sentiment) === 'Healthy' ? 'good' : 'warn',
                            }}
                            delay={80}
                        />
                        <StatCard
                            label="Champions"
                            value={countFor(summary.quadrant_distribution, 'Champion')}
                            icon={TrophyIcon}
                            accent="from-emerald-500 to-emerald-700"
                            delay={160}
                        />
                        <StatCard
                            label="At risk"
                            value={countFor(summary.quadrant_distribution, 'At Risk')}
                            icon={AlertIcon}
                            accent="from-rose-500 to-rose-700"
                            delay={240}
                        />
                    </div>

                    <div className="grid grid-cols-1 lg:grid-cols-2 gap-4">
                        <section className="card">
                            <p className="section-label mb-4">Quadrant distribution</p>
                            <QuadrantChart distribution={summary.quadrant_distribution} />
                        </section>
                        <section className="card">
                            <p className="section-label mb-4">Sentiment by role</p>
                            <RoleSentimentChart
                                byRole={summary.sentiment_by_role}
                                average={summary.average_sentiment}
                            />
                        </section>
                    </div>
                </div>
            )}
        </>
    );
}
