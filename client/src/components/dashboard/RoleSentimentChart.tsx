// components/dashboard/RoleSentimentChart.tsx
// Recharts BarChart — mean sentiment per role, highest first, 0–100 axis.

import {
    BarChart,
    Bar,
    XAxis,
    YAxis,
    CartesianGrid,
    Tooltip,
    ResponsiveContainer,
    Cell,
    ReferenceLine,
    LabelList,
} from 'recharts';
import { formatPercent, roleChartData } from '../../lib/format';
import type { RoleDatum } from '../../lib/format';

interface TooltipPayload {
    payload?: RoleDatum;
}

function RoleTooltip({ active, payload }: { active?: boolean; payload?: TooltipPayload[] }) {
    const d = payload?.[0]?.payload;
    if (!active || !d) return null;

    return (
        <div className="rounded-xl border border-slate-700 bg-slate-900/95 p-3 shadow-xl text-sm">
            <p className="font-semibold text-white mb-1">{d.role}</p>
            <p className="text-slate-400 tabular-nums">Mean sentiment {d.label}</p>
        </div>
    );
}

interface RoleSentimentChartProps {
    byRole: Record<string, number>;
    average: number;   // drawn as reference line
}

export function RoleSentimentChart({ byRole, average }: RoleSentimentChartProps) {
    const data = roleChartData(byRole);

    if (data.length === 0) {
        return (
            <div className="flex items-center justify-center h-48 text-slate-600 text-sm">
                No records loaded.
            </div>
        );
    }

    return (
        <ResponsiveContainer width="100%" height={300}>
            <BarChart data={data} margin={{ top: 20, right: 8, left: -16, bottom: 0 }} barCategoryGap="28%">
                <CartesianGrid strokeDasharray="3 3" stroke="#1e293b" vertical={false} />

                <XAxis
                    dataKey="role"
                    tick={{ fill: '#64748b', fontSize: 11 }}
                    axisLine={false}
                    tickLine={false}
                    interval={0}
                />

                <YAxis
                    domain={[0, 100]}
                    tickFormatter={(v: number) => `${v}%`}
                    tick={{ fill: '#475569', fontSize: 11 }}
                    axisLine={false}
                    tickLine={false}
                    width={40}
                />

                <Tooltip content={<RoleTooltip />} cursor={{ fill: 'rgba(99,102,241,0.05)' }} />

                <ReferenceLine
                    y={average}
                    stroke="#6366f1"
                    strokeDasharray="4 4"
                    strokeWidth={1.5}
                    label={{
                        value: `Avg ${formatPercent(average)}`,
                        position: 'insideTopRight',
                        fill: '#818cf8',
                        fontSize: 10,
                    }}
                />

                <Bar dataKey="score" radius={[6, 6, 0, 0]} maxBarSize={48}>
                    {data.map(d => <Cell key={d.role} fill={d.color} />)}
                    <LabelList dataKey="label" position="top" fill="#94a3b8" fontSize={10} />
                </Bar>
            </BarChart>
        </ResponsiveContainer>
    );
}
