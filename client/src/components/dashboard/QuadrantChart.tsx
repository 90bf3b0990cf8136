// components/dashboard/QuadrantChart.tsx
// Recharts donut — record count per engagement quadrant, fixed colours.

import { PieChart, Pie, Cell, Tooltip, ResponsiveContainer, Legend } from 'recharts';
import { quadrantChartData } from '../../lib/format';
import type { QuadrantDatum } from '../../lib/format';

interface TooltipPayload {
    payload?: QuadrantDatum;
}

function QuadrantTooltip({ active, payload, total }: { active?: boolean; payload?: TooltipPayload[]; total: number }) {
    const d = payload?.[0]?.payload;
    if (!active || !d) return null;
    const share = total > 0 ? Math.round((d.value / total) * 100) : 0;

    return (
        <div className="rounded-xl border border-slate-700 bg-slate-900/95 p-3 shadow-xl text-sm">
            <p className="font-semibold text-white mb-1">{d.name}</p>
            <p className="text-slate-400 tabular-nums">{d.value} employees · {share}%</p>
        </div>
    );
}

export function QuadrantChart({ distribution }: { distribution: Record<string, number> }) {
    const data = quadrantChartData(distribution);
    const total = data.reduce((sum, d) => sum + d.value, 0);

    if (data.length === 0) {
        return (
            <div className="flex items-center justify-center h-48 text-slate-600 text-sm">
                No records loaded.
            </div>
        );
    }

    return (
        <ResponsiveContainer width="100%" height={300}>
            <PieChart>
                <Pie
                    data={data}
                    dataKey="value"
                    nameKey="name"
                    innerRadius="45%"
                    outerRadius="80%"
                    paddingAngle={2}
                    stroke="none"
                >
                    {data.map(d => <Cell key={d.name} fill={d.color} />)}
                </Pie>
                <Tooltip content={<QuadrantTooltip total={total} />} />
                <Legend
                    verticalAlign="bottom"
                    iconType="circle"
                    wrapperStyle={{ fontSize: 12, color: '#94a3b8' }}
                />
            </PieChart>
        </ResponsiveContainer>
    );
}
