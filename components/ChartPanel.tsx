import React, { useEffect, useMemo, useState } from 'react';
import {
    Chart as ChartJS,
    CategoryScale,
    LinearScale,
    PointElement,
    LineElement,
    BarElement,
    Filler,
    Tooltip,
    Legend,
} from 'chart.js';
import { Bar, Line, Scatter } from 'react-chartjs-2';
import { ChartConfig, ChartSeries, QueryResult } from '../types';
import { CHART_TYPES, MONOKAI_COLORS, NO_DATA_MESSAGE, buildChartData, defaultChartConfig } from '../utils/chartUtils';

ChartJS.register(CategoryScale, LinearScale, PointElement, LineElement, BarElement, Filler, Tooltip, Legend);

const axisOptions = {
    responsive: true,
    maintainAspectRatio: false,
    plugins: {
        legend: { labels: { color: '#f8f8f2', font: { family: 'monospace' } } },
    },
    scales: {
        x: { ticks: { color: 'gray' }, grid: { color: '#333' } },
        y: { ticks: { color: 'gray' }, grid: { color: '#333' } },
    },
};

interface ChartPanelProps {
    result: QueryResult;
}

const ChartCanvas: React.FC<{ config: ChartConfig; series: ChartSeries }> = ({ config, series }) => {
    const color = MONOKAI_COLORS[CHART_TYPES.findIndex(c => c.type === config.type) % MONOKAI_COLORS.length];
    const border = color.replace('0.8', '1');

    if (series.kind === 'pairs') {
        const data = { datasets: [{ label: `${config.yKey} vs ${config.xKey}`, data: series.points, backgroundColor: color, borderColor: border }] };
        return <Scatter data={data} options={axisOptions} />;
    }

    const dataset = { label: config.yKey, data: series.values, backgroundColor: color, borderColor: border, borderWidth: 1 };
    if (config.type === 'bar') {
        return <Bar data={{ labels: series.labels, datasets: [dataset] }} options={axisOptions} />;
    }
    const lineData = {
        labels: series.labels,
        datasets: [{ ...dataset, fill: config.type === 'area', tension: 0.3, spanGaps: true }],
    };
    return <Line data={lineData} options={axisOptions} />;
};

export const ChartPanel: React.FC<ChartPanelProps> = ({ result }) => {
    const [config, setConfig] = useState<ChartConfig>(() => defaultChartConfig(result));

    // A new result may not have the previously chosen columns.
    useEffect(() => {
        setConfig(prev => (result.columns.includes(prev.xKey) && result.columns.includes(prev.yKey)
            ? prev
            : defaultChartConfig(result, prev.type)));
    }, [result]);

    const built = useMemo(() => buildChartData(result, config), [result, config]);

    if (result.rows.length === 0) {
        return <div className="p-4 text-sm text-monokai-comment italic">{NO_DATA_MESSAGE}</div>;
    }

    return (
        <div className="flex flex-col md:flex-row gap-4 border border-monokai-accent rounded p-4 bg-monokai-sidebar">
            <div className="w-full md:w-64 flex flex-col gap-4">
                <div>
                    <label className="block text-xs uppercase font-bold text-monokai-comment mb-2">Chart Type</label>
                    <div className="grid grid-cols-2 gap-2">
                        {CHART_TYPES.map(({ type, label }) => (
                            <button
                                key={type}
                                onClick={() => setConfig(prev => ({ ...prev, type }))}
                                className={`p-2 rounded border text-xs transition-all ${config.type === type ? 'bg-monokai-blue text-monokai-bg border-monokai-blue font-bold' : 'bg-monokai-bg border-monokai-accent text-monokai-fg hover:border-monokai-comment'}`}
                            >
                                {label}
                            </button>
                        ))}
                    </div>
                </div>
                <div>
                    <label htmlFor="chart-x" className="block text-xs uppercase font-bold text-monokai-comment mb-2">X Axis</label>
                    <select
                        id="chart-x"
                        value={config.xKey}
                        onChange={e => setConfig(prev => ({ ...prev, xKey: e.target.value }))}
                        className="w-full bg-monokai-bg border border-monokai-accent p-2 rounded text-sm text-white focus:border-monokai-blue outline-none"
                    >
                        {result.columns.map(c => <option key={c} value={c}>{c}</option>)}
                    </select>
                </div>
                <div>
                    <label htmlFor="chart-y" className="block text-xs uppercase font-bold text-monokai-comment mb-2">Y Axis</label>
                    <select
                        id="chart-y"
                        value={config.yKey}
                        onChange={e => setConfig(prev => ({ ...prev, yKey: e.target.value }))}
                        className="w-full bg-monokai-bg border border-monokai-accent p-2 rounded text-sm text-white focus:border-monokai-blue outline-none"
                    >
                        {result.columns.map(c => <option key={c} value={c}>{c}</option>)}
                    </select>
                </div>
            </div>

            <div className="flex-1 min-h-[300px] relative">
                {built.ok
                    ? <ChartCanvas config={config} series={built.series} />
                    : <div className="p-4 text-sm text-monokai-orange">{built.message}</div>}
            </div>
        </div>
    );
};
