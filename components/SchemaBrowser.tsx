import React, { useState } from 'react';
import { QueryResult } from '../types';
import { workshopApi } from '../services/workshopApi';
import { getTypeIcon } from '../utils';
import { ResultTable } from './ResultTable';

interface SchemaBrowserProps {
    tables: string[];
    rowCounts: QueryResult | null;
}

const Instructions: React.FC = () => (
    <div className="text-sm text-monokai-fg space-y-2">
        <h2 className="text-lg font-bold text-white">Instructions</h2>
        <ul className="list-disc pl-5 space-y-1">
            <li>Use the SQL editor above to write and execute your SQL queries.</li>
            <li>Select from the dropdown for example queries.</li>
            <li>Click <strong>Run Query</strong> to execute your SQL and see the results.</li>
            <li>If you make a mistake or want to start over, click <strong>Reset Database</strong> in the admin panel.</li>
        </ul>
    </div>
);

/** Column listing for one table, fetched the first time it is expanded. */
const TableColumns: React.FC<{ table: string }> = ({ table }) => {
    const [open, setOpen] = useState(false);
    const [columns, setColumns] = useState<QueryResult | null>(null);
    const [error, setError] = useState<string | null>(null);
    const [loading, setLoading] = useState(false);

    const toggle = async () => {
        const next = !open;
        setOpen(next);
        if (!next || columns) return;
        setLoading(true);
        try {
            setColumns(await workshopApi.getColumns(table));
            setError(null);
        } catch (e) {
            console.error(`[Schema] Column load failed for ${table}`, e);
            setError(e instanceof Error ? e.message : String(e));
        } finally {
            setLoading(false);
        }
    };

    return (
        <div className="border-b border-monokai-accent/30">
            <div className="p-2 hover:bg-monokai-accent cursor-pointer flex items-center gap-2 group transition-colors" onClick={() => void toggle()}>
                <span className="text-[10px] text-monokai-comment group-hover:text-white w-4 text-center">
                    {loading ? '⏳' : (open ? '▼' : '▶')}
                </span>
                <span className="text-xs font-bold text-monokai-fg group-hover:text-monokai-blue truncate">{table}</span>
            </div>
            {open && error && <div className="pl-8 pb-2 text-xs text-monokai-pink">{error}</div>}
            {open && columns && (
                <div className="bg-[#1a1b18] shadow-inner p-2">
                    <ResultTable result={columns} compact />
                    <div className="flex flex-wrap gap-2 mt-2 text-[10px] text-monokai-comment">
                        {columns.rows.map(row => (
                            <span key={String(row['Column Name'])}>
                                {getTypeIcon(String(row['Data Type']))} {String(row['Column Name'])}
                            </span>
                        ))}
                    </div>
                </div>
            )}
        </div>
    );
};

export const SchemaBrowser: React.FC<SchemaBrowserProps> = ({ tables, rowCounts }) => (
    <div className="grid grid-cols-1 md:grid-cols-5 gap-6">
        <div className="md:col-span-2">
            <Instructions />
        </div>
        <div className="md:col-span-1">
            <h2 className="text-lg font-bold text-white mb-2">Tables</h2>
            <ResultTable result={rowCounts} compact />
        </div>
        <div className="md:col-span-2">
            <h2 className="text-lg font-bold text-white mb-2">Columns</h2>
            {tables.length === 0 && (
                <div className="p-8 text-center text-xs text-monokai-comment italic">No tables found.</div>
            )}
            {/* keyed by the table list so a reset collapses and refetches every panel */}
            <div key={tables.join('|')}>
                {tables.map(table => <TableColumns key={table} table={table} />)}
            </div>
        </div>
    </div>
);
