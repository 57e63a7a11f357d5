import React, { useEffect, useMemo, useRef, useState } from 'react';
import CodeMirror from '@uiw/react-codemirror';
import { sql } from '@codemirror/lang-sql';
import { Prec } from '@codemirror/state';
import { EditorView, keymap } from '@codemirror/view';
import { dracula } from '@uiw/codemirror-theme-dracula';
import { format } from 'sql-formatter';
import { Play, Wand2 } from 'lucide-react';
import { CatalogEntry } from '../types';

interface QueryEditorProps {
    catalog: CatalogEntry[];
    selected: string;
    code: string;
    running: boolean;
    onSelect: (name: string) => void;
    onChange: (code: string) => void;
    onRun: () => void;
}

export const QueryEditor: React.FC<QueryEditorProps> = ({ catalog, selected, code, running, onSelect, onChange, onRun }) => {
    const [formatError, setFormatError] = useState<string | null>(null);

    // Keymap is built once; the ref keeps Mod-Enter pointed at the latest handler.
    const runRef = useRef(onRun);
    useEffect(() => { runRef.current = onRun; }, [onRun]);

    const extensions = useMemo(() => [
        sql(),
        EditorView.lineWrapping,
        Prec.highest(keymap.of([{ key: 'Mod-Enter', run: () => { runRef.current(); return true; } }])),
    ], []);

    const handleFormat = () => {
        try {
            onChange(format(code, { language: 'duckdb', keywordCase: 'upper' }));
            setFormatError(null);
        } catch (e) {
            setFormatError(e instanceof Error ? e.message : String(e));
        }
    };

    return (
        <div className="flex flex-col gap-3">
            <div>
                <label htmlFor="example-queries" className="block text-xs uppercase font-bold text-monokai-comment mb-2">Example Queries</label>
                <select
                    id="example-queries"
                    value={selected}
                    onChange={e => onSelect(e.target.value)}
                    className="w-full bg-monokai-bg border border-monokai-accent p-2 rounded text-sm text-white focus:border-monokai-blue outline-none"
                >
                    {catalog.map(entry => <option key={entry.name} value={entry.name}>{entry.name}</option>)}
                </select>
            </div>

            <div className="rounded overflow-hidden border border-monokai-accent">
                <CodeMirror
                    value={code}
                    height="150px"
                    theme={dracula}
                    placeholder="Write your SQL query here..."
                    extensions={extensions}
                    onChange={onChange}
                />
            </div>

            <div className="flex items-center gap-2">
                <button
                    onClick={onRun}
                    disabled={running}
                    className="px-4 py-1.5 bg-monokai-green text-monokai-bg font-bold rounded text-sm hover:opacity-90 flex items-center gap-2 disabled:opacity-50"
                >
                    <Play size={14} /> {running ? 'Running Query...' : 'Run Query'}
                </button>
                <button
                    onClick={handleFormat}
                    className="px-4 py-1.5 border border-monokai-comment text-monokai-comment hover:text-white rounded text-sm flex items-center gap-2 transition-colors"
                >
                    <Wand2 size={14} /> Format
                </button>
                <span className="text-xs text-monokai-comment ml-auto">Ctrl/⌘ + Enter to run</span>
            </div>
            {formatError && <div className="text-xs text-monokai-orange">Could not format: {formatError}</div>}
        </div>
    );
};
