// components/dashboard/StatCard.tsx — single KPI tile.
// Animated count-up for the value, optional suffix and hint line, icon slot.

import { useEffect, useRef, useState } from 'react';
import type { ReactNode } from 'react';

// ─── Count-up animation ───────────────────────────────────────────────────────

function useCountUp(target: number, decimals: number, duration = 900): number {
    const [value, setValue] = useState(0);
    const raf = useRef<number>(0);

    useEffect(() => {
        const start = performance.now();
        const scale = 10 ** decimals;

        function tick(now: number) {
            const progress = Math.min((now - start) / duration, 1);
            // ease-out cubic
            const eased = 1 - Math.pow(1 - progress, 3);
            setValue(Math.round(target * eased * scale) / scale);
            if (progress < 1) raf.current = requestAnimationFrame(tick);
        }

        raf.current = requestAnimationFrame(tick);
        return () => cancelAnimationFrame(raf.current);
    }, [target, decimals, duration]);

    return value;
}

// ─── StatCard ─────────────────────────────────────────────────────────────────

interface StatCardProps {
    label: string;
    value: number;
    icon: ReactNode;
    accent: string;      // Tailwind gradient classes, e.g. "from-emerald-500 to-emerald-700"
    decimals?: number;
    suffix?: string;     // "%" for the average
    hint?: { text: string; tone: 'good' | 'warn' };
    delay?: number;      // stagger in ms
}

export function StatCard({
    label, value, icon, accent, decimals = 0, suffix = '', hint, delay = 0,
}: StatCardProps) {
    const [visible, setVisible] = useState(false);
    const animated = useCountUp(visible ? value : 0, decimals);

    useEffect(() => {
        const t = setTimeout(() => setVisible(true), delay);
        return () => clearTimeout(t);
    }, [delay]);

    return (
        <div
            className={`
        relative overflow-hidden rounded-2xl border border-slate-800
        bg-slate-900/70 backdrop-blur-sm p-6
        transition-all duration-500
        ${visible ? 'opacity-100 translate-y-0' : 'opacity-0 translate-y-4'}
        hover:border-slate-700 group
      `}
        >
            <div className={`absolute -top-6 -right-6 w-24 h-24 rounded-full bg-gradient-to-br ${accent} opacity-10 blur-2xl group-hover:opacity-20 transition-opacity duration-300`} />

            <div className={`inline-flex items-center justify-center w-10 h-10 rounded-xl bg-gradient-to-br ${accent} shadow-lg mb-4`}>
                <span className="text-white w-5 h-5">{icon}</span>
            </div>

            <div className="flex items-end gap-1 mb-1">
                <span className="text-4xl font-extrabold tracking-tight text-white tabular-nums">
                    {animated.toFixed(decimals)}
                </span>
                {suffix && <span className="text-2xl font-bold text-slate-400 mb-0.5">{suffix}</span>}
            </div>

            <p className="text-sm font-medium text-slate-400">{label}</p>

            {hint && (
                <p className={`mt-2 text-xs font-medium ${hint.tone === 'good' ? 'text-emerald-400' : 'text-amber-400'}`}>
                    {hint.text}
                </p>
            )}
        </div>
    );
}
