// Static diagram of the sample database shipped in backup_data/.
export const sampleErDiagram = `erDiagram
  customers ||--o{ orders : places
  orders ||--|{ lineitems : contains
  products ||--o{ lineitems : "ordered as"
  customers {
    integer customerid PK
    varchar customername
    varchar company
    varchar email
    varchar city
  }
  orders {
    integer orderid PK
    integer customerid FK
    varchar customername
    varchar address
    date dateplaced
    date datefilled
    varchar invoicenumber
  }
  lineitems {
    integer lineitemid PK
    integer orderid FK
    integer productid FK
    integer quantity
  }
  products {
    integer productid PK
    varchar productname
    varchar colour
    decimal standardcost
    decimal listprice
  }
`;
