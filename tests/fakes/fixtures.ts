export const CUSTOMERS_INFO = [
  "CREATE TABLE customers (",
  "\tcustomer_id TEXT NOT NULL, ",
  "\tcustomer_city TEXT, ",
  "\tCONSTRAINT customers_pkey PRIMARY KEY (customer_id)",
  ")",
  "",
  "/*",
  "Column Comments: {'customer_id': 'key to the orders table'}",
  "*/",
  "",
  "/*",
  "2 rows from customers table:",
  "customer_id\tcustomer_city",
  "c-001\tfranca",
  "c-002\tsao paulo",
  "*/",
].join("\n");

export const ORDERS_INFO = [
  "CREATE TABLE orders (",
  "\torder_id TEXT NOT NULL, ",
  "\tcustomer_id TEXT NOT NULL, ",
  "\torder_status TEXT, ",
  "\tCONSTRAINT orders_pkey PRIMARY KEY (order_id)",
  ")",
].join("\n");
