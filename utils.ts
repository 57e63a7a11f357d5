// --- Data Type Icons Helper ---
export const getTypeIcon = (type: string) => {
    const t = type.toUpperCase();
    if (t.includes('INT') || t.includes('FLOAT') || t.includes('DOUBLE') || t.includes('DECIMAL')) return '#️⃣';
    if (t.includes('CHAR') || t.includes('TEXT') || t.includes('STRING')) return '🔤';
    if (t.includes('DATE') || t.includes('TIME')) return '📅';
    if (t.includes('BOOL')) return '☯';
    if (t.includes('[]') || t.includes('LIST') || t.includes('ARRAY')) return '📚';
    if (t.includes('STRUCT') || t.includes('MAP')) return '📦';
    if (t.includes('BLOB')) return '💾';
    return '❓';
};

/** "1 row" at exactly one, "<n> rows" otherwise (including zero). */
export const formatRowCount = (n: number): string => `${n} ${n === 1 ? 'row' : 'rows'}`;

export const formatCell = (val: unknown): string => {
    if (val === null || val === undefined) return 'NULL';
    return typeof val === 'object' ? JSON.stringify(val) : String(val);
};
