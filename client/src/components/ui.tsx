// Shared UI atoms used across the dashboard pages.

import type { ReactNode } from 'react';
import { quadrantColor } from '../lib/format';
import type { ApiRequestError } from '../api/client';

// ─── Spinner ──────────────────────────────────────────────────────────────────

export function Spinner({ className = 'w-5 h-5' }: { className?: string }) {
    return (
        <svg
            className={`animate-spin ${className}`}
            viewBox="0 0 24 24"
            fill="none"
            aria-hidden
        >
            <circle cx="12" cy="12" r="10" stroke="currentColor" strokeWidth="3" className="opacity-20" />
            <path
                className="opacity-75"
                fill="currentColor"
                d="M4 12a8 8 0 018-8V0C5.373 0 0 5.373 0 12h4z"
            />
        </svg>
    );
}

// ─── Skeleton ─────────────────────────────────────────────────────────────────

export function Skeleton({ className = '' }: { className?: string }) {
    return <div className={`rounded-xl bg-white/5 animate-pulse ${className}`} />;
}

// ─── Logo mark ────────────────────────────────────────────────────────────────

export function LogoMark({ className = 'w-8 h-8' }: { className?: string }) {
    return (
        <div className={`rounded-lg bg-indigo-600 flex items-center justify-center flex-shrink-0 ${className}`}>
            <svg viewBox="0 0 24 24" fill="none" stroke="currentColor" strokeWidth="2.5" className="w-4 h-4 text-white" aria-hidden="true">
                <path d="M3 3v18h18" />
                <path d="M7 15l4-4 3 3 5-6" />
            </svg>
        </div>
    );
}

// ─── Page header ──────────────────────────────────────────────────────────────

export function PageHeader({ title, subtitle, actions }: { title: string; subtitle?: string; actions?: ReactNode }) {
    return (
        <header className="flex flex-wrap items-end justify-between gap-4 mb-8">
            <div>
                <h1 className="text-2xl font-bold text-white tracking-tight">{title}</h1>
                {subtitle && <p className="text-sm text-slate-500 mt-1">{subtitle}</p>}
            </div>
            {actions && <div className="flex items-center gap-2">{actions}</div>}
        </header>
    );
}

// ─── Error state ──────────────────────────────────────────────────────────────
// NO_DATA is an expected state (empty table), not a failure, so it gets a
// neutral panel with a hint instead of the red one.

export function ErrorState({ error, onRetry }: { error: ApiRequestError; onRetry?: () => void }) {
    const empty = error.code === 'NO_DATA';
    return (
        <div className={`rounded-2xl border p-6 ${empty ? 'border-slate-800 bg-slate-900' : 'border-red-500/20 bg-red-500/5'}`}>
            <p className={`text-sm font-semibold ${empty ? 'text-slate-200' : 'text-red-400'}`}>
                {empty ? 'No feedback data yet' : 'Something went wrong'}
            </p>
            <p className="text-sm text-slate-400 mt-1">{error.message}</p>
            {empty && (
                <p className="text-xs text-slate-600 mt-2">
                    Import a CSV with <code className="text-slate-400">npm run import-csv -w server</code>, then reload.
                </p>
            )}
            {onRetry && (
                <button type="button" onClick={onRetry} className="btn-ghost mt-4">Try again</button>
            )}
        </div>
    );
}

// ─── Quadrant badge ───────────────────────────────────────────────────────────

export function QuadrantBadge({ quadrant }: { quadrant: string }) {
    const color = quadrantColor(quadrant);
    return (
        <span
            className="inline-flex items-center gap-1.5 px-2 py-0.5 rounded-md text-xs font-medium border whitespace-nowrap"
            style={{ color, borderColor: `${color}55`, background: `${color}14` }}
        >
            <span className="w-1.5 h-1.5 rounded-full" style={{ background: color }} />
            {quadrant}
        </span>
    );
}
