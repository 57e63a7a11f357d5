import React from 'react';
import ReactMarkdown from 'react-markdown';
import remarkGfm from 'remark-gfm';
import { cheatsheet } from '../data/cheatsheet';

export const Cheatsheet: React.FC = () => (
    <section>
        <h2 className="text-lg font-bold text-white mb-4">SQL Cheatsheet</h2>
        <div className="grid grid-cols-1 md:grid-cols-2 gap-4">
            {cheatsheet.map(section => (
                <div key={section.id} className="p-4 rounded border border-monokai-accent bg-monokai-sidebar">
                    <h3 className="font-bold text-monokai-blue mb-2">{section.title}</h3>
                    <div className="prose prose-invert prose-sm max-w-none">
                        <ReactMarkdown remarkPlugins={[remarkGfm]}>{section.markdown}</ReactMarkdown>
                    </div>
                </div>
            ))}
        </div>
    </section>
);
