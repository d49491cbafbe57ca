export const PLAN_FIXTURE_INDENTED = `Project
  Filter [amount > 50]
    Scan parquet orders`;

export const PLAN_FIXTURE_PHYSICAL = `== Physical Plan ==
*(3) Sort [total#20 DESC NULLS LAST], true, 0
+- Exchange rangepartitioning(total#20 DESC NULLS LAST, 200), ENSURE_REQUIREMENTS, [plan_id=61]
   +- *(2) HashAggregate(keys=[customer_id#12], functions=[sum(amount#13)])
      +- Exchange hashpartitioning(customer_id#12, 200), ENSURE_REQUIREMENTS, [plan_id=57]
         +- *(1) HashAggregate(keys=[customer_id#12], functions=[partial_sum(amount#13)])
            +- *(1) Project [customer_id#12, amount#13]
               +- *(1) BroadcastHashJoin [customer_id#12], [id#30], Inner, BuildRight, false
                  :- *(1) Filter (isnotnull(amount#13) AND (amount#13 > 50))
                  :  +- *(1) ColumnarToRow
                  :     +- FileScan parquet shop.orders[customer_id#12,amount#13] Batched: true, DataFilters: [isnotnull(amount#13), (amount#13 > 50)], Format: Parquet, Location: InMemoryFileIndex(1 paths)[file:/warehouse/orders], PartitionFilters: [], PushedFilters: [IsNotNull(amount), GreaterThan(amount,50)], ReadSchema: struct<customer_id:int,amount:int>
                  +- BroadcastExchange HashedRelationBroadcastMode(List(cast(input[0, int, false] as bigint)),false), [plan_id=50]
                     +- *(1) Filter isnotnull(id#30)
                        +- *(1) ColumnarToRow
                           +- FileScan parquet shop.customers[id#30] Batched: true, DataFilters: [isnotnull(id#30)], Format: Parquet, Location: InMemoryFileIndex(1 paths)[file:/warehouse/customers], PartitionFilters: [], PushedFilters: [IsNotNull(id)], ReadSchema: struct<id:int>
`;

export const PLAN_FIXTURE_EXTENDED = `== Parsed Logical Plan ==
'Project ['customer_id, 'amount]
+- 'Filter ('amount > 50)
   +- 'UnresolvedRelation [orders], [], false

== Analyzed Logical Plan ==
customer_id: int, amount: int
Project [customer_id#12, amount#13]
+- Filter (amount#13 > 50)
   +- SubqueryAlias orders
      +- Relation shop.orders[customer_id#12,amount#13] parquet

== Optimized Logical Plan ==
Filter (isnotnull(amount#13) AND (amount#13 > 50))
+- Relation shop.orders[customer_id#12,amount#13] parquet

== Physical Plan ==
*(1) Filter (isnotnull(amount#13) AND (amount#13 > 50))
+- *(1) ColumnarToRow
   +- FileScan parquet shop.orders[customer_id#12,amount#13] Batched: true, DataFilters: [isnotnull(amount#13), (amount#13 > 50)], Format: Parquet, Location: InMemoryFileIndex(1 paths)[file:/warehouse/orders], PartitionFilters: [], PushedFilters: [IsNotNull(amount), GreaterThan(amount,50)], ReadSchema: struct<customer_id:int,amount:int>
`;

export const PLAN_FIXTURE_ADAPTIVE = `== Physical Plan ==
AdaptiveSparkPlan isFinalPlan=true
+- == Final Plan ==
   *(2) HashAggregate(keys=[customer_id#12], functions=[sum(amount#13)])
   +- AQEShuffleRead coalesced
      +- ShuffleQueryStage 0, Statistics(sizeInBytes=1024.0 B, rowCount=64)
         +- Exchange hashpartitioning(customer_id#12, 200), ENSURE_REQUIREMENTS, [plan_id=30]
            +- *(1) HashAggregate(keys=[customer_id#12], functions=[partial_sum(amount#13)])
               +- FileScan parquet shop.orders[customer_id#12,amount#13] Batched: true, Format: Parquet, PushedFilters: []
+- == Initial Plan ==
   HashAggregate(keys=[customer_id#12], functions=[sum(amount#13)])
   +- Exchange hashpartitioning(customer_id#12, 200), ENSURE_REQUIREMENTS, [plan_id=20]
      +- HashAggregate(keys=[customer_id#12], functions=[partial_sum(amount#13)])
         +- FileScan parquet shop.orders[customer_id#12,amount#13] Batched: true, Format: Parquet, PushedFilters: []
`;

export const PLAN_FIXTURE_FORMATTED = `== Physical Plan ==
* HashAggregate (5)
+- Exchange (4)
   +- * HashAggregate (3)
      +- * Filter (2)
         +- * ColumnarToRow (1)
            +- Scan parquet shop.orders (0)


(0) Scan parquet shop.orders
Output [2]: [customer_id#12, amount#13]
Batched: true
Location: InMemoryFileIndex [file:/warehouse/orders]
PushedFilters: [IsNotNull(amount), GreaterThan(amount,50)]
ReadSchema: struct<customer_id:int,amount:int>

(1) ColumnarToRow [codegen id : 1]
Input [2]: [customer_id#12, amount#13]

(2) Filter [codegen id : 1]
Input [2]: [customer_id#12, amount#13]
Condition : (isnotnull(amount#13) AND (amount#13 > 50))

(3) HashAggregate [codegen id : 1]
Input [2]: [customer_id#12, amount#13]
Keys [1]: [customer_id#12]
Functions [1]: [partial_sum(amount#13)]

(4) Exchange
Input [2]: [customer_id#12, sum#40L]
Arguments: hashpartitioning(customer_id#12, 200), ENSURE_REQUIREMENTS, [plan_id=15]

(5) HashAggregate [codegen id : 2]
Input [2]: [customer_id#12, sum#40L]
Keys [1]: [customer_id#12]
Functions [1]: [sum(amount#13)]
`;

export const PLAN_FIXTURE_TABLE_FRAMED = `+----------------------------------------------------+
|plan                                                |
+----------------------------------------------------+
|== Physical Plan ==
*(1) Filter (amount#13 > 50)
+- *(1) Scan ExistingRDD[customer_id#12,amount#13]
|
+----------------------------------------------------+`;

export const PLAN_FIXTURE_SCALAR_SUBQUERY = `== Physical Plan ==
*(1) Filter (isnotnull(amount#13) AND (amount#13 > Subquery scalar-subquery#3, [id=#50]))
:  +- Subquery scalar-subquery#3, [id=#50]
:     +- *(2) HashAggregate(keys=[], functions=[avg(amount#13)])
:        +- FileScan parquet shop.orders[amount#13] Batched: true, Format: Parquet, PushedFilters: []
+- *(1) ColumnarToRow
   +- FileScan parquet shop.orders[customer_id#12,amount#13] Batched: true, Format: Parquet, PushedFilters: [IsNotNull(amount)]
`;

export const PLAN_FIXTURES: ReadonlyArray<{ key: string; label: string; text: string }> = [
  { key: "indented", label: "Indented logical plan", text: PLAN_FIXTURE_INDENTED },
  { key: "physical", label: "Physical plan with joins", text: PLAN_FIXTURE_PHYSICAL },
  { key: "extended", label: "Extended explain", text: PLAN_FIXTURE_EXTENDED },
  { key: "adaptive", label: "Adaptive plan", text: PLAN_FIXTURE_ADAPTIVE },
  { key: "formatted", label: "Formatted explain", text: PLAN_FIXTURE_FORMATTED },
  { key: "subquery", label: "Filter with a scalar subquery", text: PLAN_FIXTURE_SCALAR_SUBQUERY },
];
