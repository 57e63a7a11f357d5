import { CatalogEntry } from '../types';

// Starting points for the editor, roughly in order of difficulty.
export const exampleQueries: CatalogEntry[] = [
  { name: 'Select Customers', sql: 'SELECT * FROM customers;' },
  { name: 'Select Orders', sql: 'SELECT * FROM orders;' },
  { name: 'Select Products', sql: 'SELECT * FROM products;' },
  { name: 'Count Orders', sql: 'SELECT COUNT(1) FROM orders;' },
  { name: 'Filter Customers', sql: "SELECT * FROM customers WHERE company = 'AdventureWorks';" },
  { name: 'Search Customers', sql: "SELECT * FROM customers WHERE company LIKE 'Con%';" },
  {
    name: 'Insert Customer',
    sql: "INSERT INTO customers VALUES (513, 'Maya Cohen', 'Northwind', 'maya.cohen@example.com', 'Chicago');",
  },
  { name: 'Delete Customer', sql: 'DELETE FROM customers WHERE customerid = 501;' },
  {
    name: 'Select OrderDetails',
    sql: `SELECT customername, address, dateplaced, datefilled,
       invoicenumber, colour, standardcost, listprice, listprice - standardcost AS profit
FROM lineitems
LEFT JOIN orders ON (lineitems.orderid = orders.orderid)
LEFT JOIN products ON (lineitems.productid = products.productid)
WHERE lineitems.orderid = 9;`,
  },
  {
    name: 'Select Order Counts',
    sql: `SELECT orders.customername, orders.address,
       COUNT(lineitems.lineitemid) AS total_line_items,
       SUM(lineitems.quantity) AS total_item_count
FROM orders
LEFT JOIN lineitems ON orders.orderid = lineitems.orderid
GROUP BY orders.orderid, orders.customername, orders.address
ORDER BY orders.orderid;`,
  },
  {
    name: 'List Profitable Customers',
    sql: `SELECT customername, SUM(profit) AS profit FROM (
    SELECT customername, (listprice - standardcost) * quantity AS profit
    FROM lineitems
    LEFT JOIN orders ON (lineitems.orderid = orders.orderid)
    LEFT JOIN products ON (lineitems.productid = products.productid)
) x
GROUP BY customername
ORDER BY SUM(profit) DESC
LIMIT 5;`,
  },
  {
    name: 'High Revenue Companies',
    sql: `SELECT customers.company,
       COUNT(DISTINCT orders.orderid) AS order_count,
       SUM(lineitems.quantity * products.listprice) AS revenue
FROM customers
JOIN orders ON orders.customerid = customers.customerid
JOIN lineitems ON lineitems.orderid = orders.orderid
JOIN products ON products.productid = lineitems.productid
GROUP BY customers.company
HAVING SUM(lineitems.quantity * products.listprice) > 1000
ORDER BY revenue DESC;`,
  },
];
