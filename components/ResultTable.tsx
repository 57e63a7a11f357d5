import React from 'react';
import { QueryResult } from '../types';
import { formatCell, formatRowCount } from '../utils';

interface ResultTableProps {
    result: QueryResult | null;
    loading?: boolean;
    /** Hides the row-count caption (schema tables) */
    compact?: boolean;
}

export const ResultTable: React.FC<ResultTableProps> = ({ result, loading, compact }) => {
    if (loading) {
        return (
            <div className="p-4 bg-[#282a36] border-t border-monokai-accent/30 flex items-center gap-2 text-monokai-comment text-sm">
                <div className="w-4 h-4 border-2 border-monokai-blue border-t-transparent rounded-full animate-spin"></div>
                Running query...
            </div>
        );
    }

    if (!result) return null;

    return (
        <div className="flex flex-col gap-2">
            {result.error && (
                <div className="p-3 rounded bg-monokai-pink/10 border border-monokai-pink/40 text-monokai-pink text-sm font-mono whitespace-pre-wrap">
                    {result.error}
                </div>
            )}
            {!compact && (
                <div className="px-3 py-2 rounded bg-monokai-blue/10 border border-monokai-blue/30 text-sm text-monokai-fg">
                    <strong>{formatRowCount(result.rows.length)}</strong> returned.
                    {result.executionTime > 0 && (
                        <span className="text-xs ml-2 opacity-70">({result.executionTime.toFixed(2)}ms)</span>
                    )}
                </div>
            )}
            {result.columns.length > 0 && (
                <div className="bg-[#282a36] border border-monokai-accent/30 rounded max-h-[400px] overflow-auto custom-scrollbar">
                    <table className="w-full text-left border-collapse text-xs font-mono">
                        <thead className="bg-[#21222c] sticky top-0 z-10 shadow-sm">
                            <tr>
                                {result.columns.map(col => (
                                    <th key={col} className="p-2 border-b border-monokai-accent/30 text-monokai-blue font-semibold whitespace-nowrap">
                                        {col}
                                    </th>
                                ))}
                            </tr>
                        </thead>
                        <tbody>
                            {result.rows.map((row, idx) => (
                                <tr key={idx} className="hover:bg-monokai-accent/10 border-b border-monokai-accent/10 last:border-0">
                                    {result.columns.map(col => {
                                        const val = row[col];
                                        return (
                                            <td key={col} className={`p-2 whitespace-nowrap text-monokai-fg ${val === null ? 'italic text-monokai-comment/60' : ''}`}>
                                                {formatCell(val)}
                                            </td>
                                        );
                                    })}
                                </tr>
                            ))}
                        </tbody>
                    </table>
                </div>
            )}
        </div>
    );
};
