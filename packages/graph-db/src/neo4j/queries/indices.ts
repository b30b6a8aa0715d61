// Schema statements; every one is idempotent.

export const FULLTEXT_NODE_INDEX = "node_name_and_summary";
export const FULLTEXT_EDGE_INDEX = "edge_name_and_fact";

export const INDEX_STATEMENTS = [
  `CREATE CONSTRAINT entity_uuid IF NOT EXISTS FOR (n:Entity) REQUIRE n.uuid IS UNIQUE`,
  `CREATE CONSTRAINT episode_uuid IF NOT EXISTS FOR (n:Episodic) REQUIRE n.uuid IS UNIQUE`,
  `CREATE INDEX entity_name_key IF NOT EXISTS FOR (n:Entity) ON (n.name_key, n.group_id)`,
  `CREATE INDEX relation_uuid IF NOT EXISTS FOR ()-[e:RELATES_TO]-() ON (e.uuid)`,
  `CREATE FULLTEXT INDEX ${FULLTEXT_NODE_INDEX} IF NOT EXISTS FOR (n:Entity) ON EACH [n.name, n.summary]`,
  `CREATE FULLTEXT INDEX ${FULLTEXT_EDGE_INDEX} IF NOT EXISTS FOR ()-[e:RELATES_TO]-() ON EACH [e.name, e.fact]`,
] as const;
