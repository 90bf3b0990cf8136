import { useState, useEffect } from 'react';
import type { ReactNode } from 'react';
import { NavLink, useLocation } from 'react-router-dom';
import { useStatus } from '../../hooks/useAnalytics';
import { LogoMark } from '../ui';

// ─── Icons ────────────────────────────────────────────────────────────────────
function MenuIcon({ open }: { open: boolean }) {
    return (
        <svg viewBox="0 0 24 24" fill="none" stroke="currentColor" strokeWidth="2"
            strokeLinecap="round" strokeLinejoin="round" className="w-5 h-5" aria-hidden="true">
            {open ? (
                <>
                    <line x1="18" y1="6" x2="6" y2="18" />
                    <line x1="6" y1="6" x2="18" y2="18" />
                </>
            ) : (
                <>
                    <line x1="3" y1="6" x2="21" y2="6" />
                    <line x1="3" y1="12" x2="21" y2="12" />
                    <line x1="3" y1="18" x2="21" y2="18" />
                </>
            )}
        </svg>
    );
}

const LINKS: { to: string; label: string; icon: ReactNode }[] = [
    {
        to: '/overview',
        label: 'Overview',
        icon: (
            <svg viewBox="0 0 24 24" fill="none" stroke="currentColor" strokeWidth="2" strokeLinecap="round" strokeLinejoin="round" className="w-5 h-5" aria-hidden="true">
                <rect x="3" y="3" width="7" height="7" /><rect x="14" y="3" width="7" height="7" />
                <rect x="3" y="14" width="7" height="7" /><rect x="14" y="14" width="7" height="7" />
            </svg>
        ),
    },
    {
        to: '/employees',
        label: 'Employees',
        icon: (
            <svg viewBox="0 0 24 24" fill="none" stroke="currentColor" strokeWidth="2" strokeLinecap="round" strokeLinejoin="round" className="w-5 h-5" aria-hidden="true">
                <path d="M20 21v-2a4 4 0 0 0-4-4H8a4 4 0 0 0-4 4v2" /><circle cx="12" cy="7" r="4" />
            </svg>
        ),
    },
    {
        to: '/insights',
        label: 'AI Insights',
        icon: (
            <svg viewBox="0 0 24 24" fill="none" stroke="currentColor" strokeWidth="2" strokeLinecap="round" strokeLinejoin="round" className="w-5 h-5" aria-hidden="true">
                <polyline points="22 12 18 12 15 21 9 3 6 12 2 12" />
            </svg>
        ),
    },
];

// ─── API status indicator ─────────────────────────────────────────────────────

function StatusPanel() {
    const { data, error } = useStatus();

    let dot = 'bg-slate-600';
    let text = 'Checking API…';
    if (error) {
        dot = 'bg-red-500';
        text = 'API offline';
    } else if (data) {
        dot = data.data_loaded ? 'bg-emerald-400' : 'bg-amber-400';
        text = data.data_loaded ? `${data.total_employees} records loaded` : 'Online, no data';
    }

    return (
        <div className="px-3 py-2.5 rounded-xl border border-slate-800 bg-slate-950/40 space-y-1.5">
            <p className="text-[9px] text-slate-600 uppercase tracking-wider">API status</p>
            <p className="flex items-center gap-2 text-xs text-slate-300">
                <span className={`w-1.5 h-1.5 rounded-full ${dot}`} />
                {text}
            </p>
            {data && (
                <p className="text-[10px] text-slate-500">
                    AI analysis {data.ai_configured ? 'available' : 'not configured'}
                </p>
            )}
            {data?.last_load?.status === 'failed' && (
                <p className="text-[10px] text-red-400">Last load failed ({data.last_load.reason})</p>
            )}
        </div>
    );
}

export function Sidebar() {
    const location = useLocation();
    const [open, setOpen] = useState(false);

    useEffect(() => {
        const id = setTimeout(() => setOpen(false), 0);
        return () => clearTimeout(id);
    }, [location.pathname]);

    useEffect(() => {
        if (!open) return;
        const handler = (e: KeyboardEvent) => { if (e.key === 'Escape') setOpen(false); };
        window.addEventListener('keydown', handler);
        return () => window.removeEventListener('keydown', handler);
    }, [open]);

    const panel = (
        <div className="flex flex-col h-full overflow-hidden">
            <div className="p-5 pb-4 flex-shrink-0">
                <div className="flex items-center gap-3 mb-7">
                    <LogoMark />
                    <div className="min-w-0">
                        <p className="text-xs font-bold text-white leading-none truncate">Sentiment Analytics</p>
                        <p className="text-[10px] text-slate-500 mt-1 uppercase tracking-wider">Employee feedback</p>
                    </div>
                </div>
                <nav className="space-y-0.5">
                    {LINKS.map(link => (
                        <NavLink key={link.to} to={link.to}
                            className={({ isActive }) =>
                                `flex items-center gap-3 px-3 py-2.5 rounded-xl text-sm font-medium transition-all duration-150
                                ${isActive
                                    ? 'bg-indigo-500/10 text-indigo-400 border border-indigo-500/20'
                                    : 'text-slate-400 hover:text-slate-100 hover:bg-slate-800/70 border border-transparent'}`
                            }
                        >
                            <span className="flex-shrink-0">{link.icon}</span>
                            <span>{link.label}</span>
                        </NavLink>
                    ))}
                </nav>
            </div>

            <div className="mt-auto p-5 border-t border-slate-800 flex-shrink-0">
                <StatusPanel />
            </div>
        </div>
    );

    return (
        <>
            {/* ── Desktop sidebar (md+) ─────────────────────────────────── */}
            <aside className="hidden md:flex w-60 xl:w-64 flex-col bg-slate-900 border-r border-slate-800 h-screen sticky top-0 flex-shrink-0">
                {panel}
            </aside>

            {/* ── Mobile top bar (< md) ─────────────────────────────────── */}
            <div className="md:hidden fixed top-0 left-0 right-0 z-40 flex items-center justify-between px-4 h-14 bg-slate-950/90 border-b border-slate-800 backdrop-blur-md">
                <div className="flex items-center gap-2.5">
                    <LogoMark className="w-7 h-7" />
                    <span className="text-sm font-bold text-white">Sentiment Analytics</span>
                </div>
                <button onClick={() => setOpen(v => !v)}
                    className="p-2 rounded-lg text-slate-400 hover:text-slate-100 hover:bg-slate-800 transition-colors"
                    aria-label={open ? 'Close menu' : 'Open menu'} aria-expanded={open}>
                    <MenuIcon open={open} />
                </button>
            </div>

            {open && (
                <div className="md:hidden fixed inset-0 z-40 bg-slate-950/70 backdrop-blur-sm"
                    onClick={() => setOpen(false)} aria-hidden="true" />
            )}

            <aside
                className={`md:hidden fixed top-0 left-0 bottom-0 z-50 w-72 bg-slate-900 border-r border-slate-800 transform transition-transform duration-300 ease-out
                    ${open ? 'translate-x-0' : '-translate-x-full'}`}
                aria-label="Navigation"
            >
                {panel}
            </aside>
        </>
    );
}
