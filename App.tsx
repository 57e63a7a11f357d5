import React, { useCallback, useEffect, useState } from 'react';
import { BarChart2 } from 'lucide-react';
import { CatalogEntry, QueryResult, SchemaOverview } from './types';
import { loadSchemaOverview, workshopApi } from './services/workshopApi';
import { QueryEditor } from './components/QueryEditor';
import { ResultTable } from './components/ResultTable';
import { ChartPanel } from './components/ChartPanel';
import { SchemaBrowser } from './components/SchemaBrowser';
import { ERDiagram } from './components/ERDiagram';
import { Cheatsheet } from './components/Cheatsheet';
import { AdminPanel } from './components/AdminPanel';

interface Notice {
    id: number;
    kind: 'success' | 'warning' | 'error';
    text: string;
}

const NOTICE_STYLES: Record<Notice['kind'], string> = {
    success: 'bg-monokai-green/10 border-monokai-green/40 text-monokai-green',
    warning: 'bg-monokai-orange/10 border-monokai-orange/40 text-monokai-orange',
    error: 'bg-monokai-pink/10 border-monokai-pink/40 text-monokai-pink',
};

let noticeSeq = 0;

const describe = (e: unknown) => (e instanceof Error ? e.message : String(e));

const App: React.FC = () => {
    const [catalog, setCatalog] = useState<CatalogEntry[]>([]);
    const [selected, setSelected] = useState('');
    const [code, setCode] = useState('');
    const [result, setResult] = useState<QueryResult | null>(null);
    const [running, setRunning] = useState(false);
    const [showChart, setShowChart] = useState(false);
    const [schema, setSchema] = useState<SchemaOverview | null>(null);
    const [resetting, setResetting] = useState(false);
    const [notices, setNotices] = useState<Notice[]>([]);

    const notify = useCallback((kind: Notice['kind'], text: string) => {
        setNotices(prev => [...prev.slice(-2), { id: ++noticeSeq, kind, text }]);
    }, []);

    // Tables and counts are read again after every action that can change them.
    const refreshSchema = useCallback(async () => {
        try {
            const { overview, reset } = await loadSchemaOverview(workshopApi);
            if (reset) {
                notify('warning', 'No tables found in the database! It was reset to its original state.');
                for (const w of reset.warnings) notify('warning', w);
            }
            setSchema(overview);
        } catch (e) {
            notify('error', `Could not load schema: ${describe(e)}`);
        }
    }, [notify]);

    const runQuery = useCallback(async (sql: string) => {
        setRunning(true);
        try {
            setResult(await workshopApi.runQuery(sql));
        } catch (e) {
            notify('error', `Query request failed: ${describe(e)}`);
        } finally {
            setRunning(false);
        }
        await refreshSchema();
    }, [notify, refreshSchema]);

    useEffect(() => {
        const boot = async () => {
            try {
                const entries = await workshopApi.getCatalog();
                setCatalog(entries);
                if (entries.length > 0) {
                    setSelected(entries[0].name);
                    setCode(entries[0].sql);
                    await runQuery(entries[0].sql);
                    return;
                }
            } catch (e) {
                notify('error', `Could not load example queries: ${describe(e)}`);
            }
            await refreshSchema();
        };
        void boot();
    }, [notify, refreshSchema, runQuery]);

    const handleSelect = (name: string) => {
        const entry = catalog.find(e => e.name === name);
        if (!entry) return;
        setSelected(name);
        setCode(entry.sql);
    };

    const handleReset = async () => {
        setResetting(true);
        try {
            const report = await workshopApi.resetDatabase();
            if (report.restored) notify('success', 'Database reset to original state!');
            else notify('error', `Reset did not restore any tables. ${report.warnings.join(' ')}`);
        } catch (e) {
            notify('error', `Reset failed: ${describe(e)}`);
        } finally {
            setResetting(false);
        }
        await refreshSchema();
    };

    return (
        <div className="min-h-screen bg-monokai-bg text-monokai-fg p-6 flex flex-col gap-8 max-w-7xl mx-auto">
            <header>
                <h1 className="text-3xl font-bold text-white">SQL Querying Workshop</h1>
            </header>

            {notices.length > 0 && (
                <div className="flex flex-col gap-2">
                    {notices.map(n => (
                        <div key={n.id} className={`px-3 py-2 rounded border text-sm flex justify-between ${NOTICE_STYLES[n.kind]}`}>
                            <span>{n.text}</span>
                            <button onClick={() => setNotices(prev => prev.filter(p => p.id !== n.id))} className="ml-4 opacity-70 hover:opacity-100">✕</button>
                        </div>
                    ))}
                </div>
            )}

            <QueryEditor
                catalog={catalog}
                selected={selected}
                code={code}
                running={running}
                onSelect={handleSelect}
                onChange={setCode}
                onRun={() => void runQuery(code)}
            />

            <section className="flex flex-col gap-3">
                <h2 className="text-xl font-bold text-white">Query Results</h2>
                <ResultTable result={result} loading={running} />
                {result && (
                    <>
                        <label className="flex items-center gap-2 cursor-pointer text-sm text-white">
                            <input type="checkbox" checked={showChart} onChange={e => setShowChart(e.target.checked)} />
                            <BarChart2 size={14} /> Visualize
                        </label>
                        {showChart && <ChartPanel result={result} />}
                    </>
                )}
            </section>

            <SchemaBrowser tables={schema?.tables ?? []} rowCounts={schema?.rowCounts ?? null} />
            <ERDiagram />
            <Cheatsheet />
            <AdminPanel resetting={resetting} onReset={() => void handleReset()} />
        </div>
    );
};

export default App;
