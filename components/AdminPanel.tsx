import React, { useState } from 'react';
import { RotateCcw } from 'lucide-react';

interface AdminPanelProps {
    resetting: boolean;
    onReset: () => void;
}

export const AdminPanel: React.FC<AdminPanelProps> = ({ resetting, onReset }) => {
    const [enabled, setEnabled] = useState(false);

    return (
        <section className="flex flex-col gap-3">
            <label className="flex items-center gap-2 cursor-pointer text-sm text-white">
                <input type="checkbox" checked={enabled} onChange={e => setEnabled(e.target.checked)} />
                Admin Panel
            </label>
            {enabled && (
                <button
                    onClick={onReset}
                    disabled={resetting}
                    className="self-start px-4 py-1.5 bg-monokai-pink text-white font-bold rounded text-sm hover:opacity-90 flex items-center gap-2 disabled:opacity-50"
                >
                    <RotateCcw size={14} /> {resetting ? 'Resetting database...' : 'Reset Database'}
                </button>
            )}
        </section>
    );
};
