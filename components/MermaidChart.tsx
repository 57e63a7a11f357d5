import React, { useEffect, useRef, useState } from 'react';
import mermaid from 'mermaid';

mermaid.initialize({
    startOnLoad: false,
    theme: 'base',
    securityLevel: 'strict',
    themeVariables: {
        primaryColor: '#e0e7ff',
        primaryTextColor: '#1e3a8a',
        primaryBorderColor: '#1e3a8a',
        lineColor: '#6366f1',
    }
});

interface MermaidChartProps {
    chart: string;
}

export const MermaidChart: React.FC<MermaidChartProps> = ({ chart }) => {
    const [svg, setSvg] = useState<string>('');
    const [error, setError] = useState<string | null>(null);
    const idRef = useRef(`mermaid-${Math.random().toString(36).substring(2, 9)}`);

    useEffect(() => {
        let cancelled = false;
        if (!chart) return;

        mermaid.render(idRef.current, chart)
            .then(({ svg }) => {
                if (cancelled) return;
                setSvg(svg);
                setError(null);
            })
            .catch((err: unknown) => {
                console.error('Mermaid Render Error:', err);
                if (!cancelled) setError('Diagram Render Failed');
            });

        return () => { cancelled = true; };
    }, [chart]);

    if (error) return <div className="text-red-400 text-xs text-center p-4">❌ {error}</div>;

    return (
        <div
            className="mermaid-container w-full overflow-x-auto flex justify-center p-4"
            dangerouslySetInnerHTML={{ __html: svg }}
        />
    );
};
