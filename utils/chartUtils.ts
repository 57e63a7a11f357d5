import { CellValue, ChartBuildResult, ChartConfig, ChartPoint, ChartType, QueryResult } from '../types';

export const MONOKAI_COLORS = [
    'rgba(249, 38, 114, 0.8)', // Pink
    'rgba(166, 226, 46, 0.8)', // Green
    'rgba(102, 217, 239, 0.8)', // Blue
    'rgba(253, 151, 31, 0.8)', // Orange
];

export const CHART_TYPES: { type: ChartType; label: string }[] = [
    { type: 'line', label: 'Line' },
    { type: 'bar', label: 'Bar' },
    { type: 'scatter', label: 'Scatter' },
    { type: 'area', label: 'Area' },
];

export const NO_DATA_MESSAGE = 'No data to visualize.';

export const chartLabel = (type: ChartType): string =>
    CHART_TYPES.find(c => c.type === type)?.label ?? type;

export const mismatchMessage = (config: ChartConfig): string =>
    `Cannot draw a ${chartLabel(config.type)} chart from "${config.xKey}" and "${config.yKey}". Please choose different columns.`;

/** Numeric reading of a cell: null stays null, anything non-numeric is NaN. */
export const toNumeric = (value: CellValue): number | null => {
    if (value === null) return null;
    if (typeof value === 'number') return value;
    if (typeof value === 'string' && value.trim() !== '') return Number(value);
    return NaN;
};

/** Picks a sensible starting X/Y pair: first column on X, first numeric-looking column after it on Y. */
export const defaultChartConfig = (result: QueryResult, type: ChartType = 'bar'): ChartConfig => {
    const [first = '', ...rest] = result.columns;
    const numeric = rest.find(col => result.rows.every(r => !Number.isNaN(toNumeric(r[col] ?? null))));
    return { type, xKey: first, yKey: numeric ?? rest[0] ?? first };
};

/**
 * Indexes the result on the X column and plots the Y column; Scatter plots
 * raw X/Y pairs instead. Repeated X values keep their first position and
 * take the value of the last row (last write wins).
 */
export const buildChartData = (result: QueryResult, config: ChartConfig): ChartBuildResult => {
    if (result.rows.length === 0) return { ok: false, message: NO_DATA_MESSAGE };

    const { xKey, yKey } = config;
    if (!result.columns.includes(xKey) || !result.columns.includes(yKey)) {
        return { ok: false, message: mismatchMessage(config) };
    }

    if (config.type === 'scatter') {
        const points: ChartPoint[] = [];
        for (const row of result.rows) {
            const x = toNumeric(row[xKey]);
            const y = toNumeric(row[yKey]);
            if (Number.isNaN(x) || Number.isNaN(y)) return { ok: false, message: mismatchMessage(config) };
            if (x === null || y === null) continue;
            points.push({ x, y });
        }
        return { ok: true, series: { kind: 'pairs', points } };
    }

    const labels: string[] = [];
    const values: (number | null)[] = [];
    const position = new Map<string, number>();

    for (const row of result.rows) {
        const y = toNumeric(row[yKey]);
        if (Number.isNaN(y)) return { ok: false, message: mismatchMessage(config) };

        const label = row[xKey] === null ? 'NULL' : String(row[xKey]);
        const at = position.get(label);
        if (at === undefined) {
            position.set(label, labels.length);
            labels.push(label);
            values.push(y);
        } else {
            values[at] = y;
        }
    }

    return { ok: true, series: { kind: 'indexed', labels, values } };
};
