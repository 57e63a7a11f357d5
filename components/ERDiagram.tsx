import React from 'react';
import { sampleErDiagram } from '../data/erDiagram';
import { MermaidChart } from './MermaidChart';

export const ERDiagram: React.FC = () => (
    <section>
        <h2 className="text-lg font-bold text-white mb-2">Entity Relationship Diagram</h2>
        <div className="bg-white rounded-xl border border-gray-100 shadow-sm">
            <MermaidChart chart={sampleErDiagram} />
        </div>
    </section>
);
