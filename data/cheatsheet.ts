export interface CheatsheetSection {
  id: string;
  title: string;
  markdown: string;
}

export const cheatsheet: CheatsheetSection[] = [
  {
    id: 'select',
    title: 'Reading rows',
    markdown: `
| Clause | Example |
|---|---|
| All columns | \`SELECT * FROM customers;\` |
| Some columns | \`SELECT customername, city FROM customers;\` |
| Rename a column | \`SELECT listprice AS price FROM products;\` |
| Unique values | \`SELECT DISTINCT city FROM customers;\` |
| Sort | \`SELECT * FROM products ORDER BY listprice DESC;\` |
| First N rows | \`SELECT * FROM orders LIMIT 5;\` |
`,
  },
  {
    id: 'filter',
    title: 'Filtering',
    markdown: `
- Equality: \`WHERE company = 'Contoso'\`
- Comparison: \`WHERE listprice > 100\`
- Pattern match: \`WHERE customername LIKE 'A%'\` (\`%\` any text, \`_\` one character)
- Lists and ranges: \`WHERE city IN ('Seattle', 'Austin')\`, \`WHERE quantity BETWEEN 2 AND 4\`
- Missing values: \`WHERE datefilled IS NULL\` (never \`= NULL\`)
- Combine with \`AND\`, \`OR\`, \`NOT\` and parentheses
`,
  },
  {
    id: 'aggregate',
    title: 'Aggregating',
    markdown: `
\`COUNT\`, \`SUM\`, \`AVG\`, \`MIN\`, \`MAX\` collapse many rows into one.
Add \`GROUP BY\` to get one row per group, and \`HAVING\` to filter groups:

\`\`\`sql
SELECT city, COUNT(*) AS customers
FROM customers
GROUP BY city
HAVING COUNT(*) > 1;
\`\`\`

\`WHERE\` filters rows before grouping, \`HAVING\` filters groups after.
`,
  },
  {
    id: 'join',
    title: 'Joining tables',
    markdown: `
| Join | Keeps |
|---|---|
| \`INNER JOIN\` | rows with a match on both sides |
| \`LEFT JOIN\` | every row of the left table, NULLs where the right has no match |
| \`RIGHT JOIN\` | every row of the right table |
| \`FULL JOIN\` | every row of both tables |

\`\`\`sql
SELECT orders.orderid, products.productname, lineitems.quantity
FROM lineitems
JOIN orders ON lineitems.orderid = orders.orderid
JOIN products ON lineitems.productid = products.productid;
\`\`\`
`,
  },
  {
    id: 'subquery',
    title: 'Subqueries',
    markdown: `
A query can be used as a table (\`FROM (SELECT ...) x\`) or as a value:

\`\`\`sql
SELECT * FROM products
WHERE listprice > (SELECT AVG(listprice) FROM products);
\`\`\`
`,
  },
  {
    id: 'modify',
    title: 'Changing data',
    markdown: `
- Insert: \`INSERT INTO customers VALUES (600, 'Sam Lee', 'Contoso', 'sam.lee@example.com', 'Denver');\`
- Update: \`UPDATE products SET listprice = 25 WHERE productid = 5;\`
- Delete: \`DELETE FROM orders WHERE orderid = 15;\`

Changes are permanent. Use **Reset Database** in the admin panel to get the original data back.
`,
  },
];
