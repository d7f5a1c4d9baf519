import { useMemo } from 'react';
import { CartesianGrid, Line, LineChart, ResponsiveContainer, Tooltip, XAxis, YAxis } from 'recharts';
import type { Scene } from '../types/lsystem';
import { buildExpansionSeries, formatCompact, summarizeScene } from '../utils/expansionStats';
import { Panel, StatRow } from './ui';

interface ExpansionStatsProps {
    sequence: string;
    lengths: number[];
    predictedLength: number;
    scene: Scene;
    maxSequenceLength: number;
}

export function ExpansionStats({ sequence, lengths, predictedLength, scene, maxSequenceLength }: ExpansionStatsProps) {
    const series = useMemo(() => buildExpansionSeries(lengths), [lengths]);
    const summary = useMemo(() => summarizeScene(sequence, scene), [sequence, scene]);

    return (
        <Panel title="Expansion">
            <div style={{ height: 160, marginBottom: 12 }}>
                {series.length > 1 ? (
                    <ResponsiveContainer width="100%" height="100%">
                        <LineChart data={series} margin={{ top: 8, right: 12, bottom: 0, left: 0 }}>
                            <CartesianGrid stroke="rgba(255,255,255,0.06)" vertical={false} />
                            <XAxis dataKey="iteration" stroke="#64748b" fontSize={11} tickLine={false} />
                            <YAxis stroke="#64748b" fontSize={11} tickLine={false} width={48} tickFormatter={formatCompact} />
                            <Tooltip
                                contentStyle={{ background: '#0f172a', border: '1px solid #334155', borderRadius: 8, fontSize: 12 }}
                                labelFormatter={(label) => `Iteration ${label}`}
                            />
                            <Line type="monotone" dataKey="length" name="Symbols" stroke="#60a5fa" strokeWidth={2} dot={{ r: 2 }} isAnimationActive={false} />
                        </LineChart>
                    </ResponsiveContainer>
                ) : (
                    <div style={{ height: '100%', display: 'flex', alignItems: 'center', justifyContent: 'center', color: 'var(--color-text-dim)', fontSize: 13 }}>
                        Raise the iteration count to see growth
                    </div>
                )}
            </div>

            <StatRow
                label="Predicted length"
                value={predictedLength}
                valueColor={predictedLength > maxSequenceLength ? '#f87171' : undefined}
            />
            <StatRow label="Symbols drawn" value={summary.symbols} />
            <StatRow label="Segments" value={summary.segments} />
            <StatRow label="Dots" value={summary.dots} />
            <StatRow label="Filled polygons" value={summary.filledPolygons} />
            {summary.openPolygons > 0 && (
                <StatRow label="Unclosed polygons" value={summary.openPolygons} valueColor="#fbbf24" />
            )}
            <StatRow label="Extent" value={`${summary.width.toFixed(1)} × ${summary.height.toFixed(1)}`} />
        </Panel>
    );
}
