import { MAX_CENTER_DISTANCE } from "../../search/hybrid.js";
import { FULLTEXT_EDGE_INDEX, FULLTEXT_NODE_INDEX } from "./indices.js";

const EDGE_COLUMNS = `
  e.uuid AS uuid, e.name AS name, e.fact AS fact,
  startNode(e).uuid AS sourceNodeUuid, endNode(e).uuid AS targetNodeUuid,
  e.episodes AS episodes, e.valid_at AS validAt, e.invalid_at AS invalidAt,
  e.created_at AS createdAt, e.group_id AS groupId
`;

const NODE_COLUMNS = `
  n.uuid AS uuid, n.name AS name, n.summary AS summary, n.labels AS labels,
  n.created_at AS createdAt, n.attributes AS attributes, n.group_id AS groupId
`;

export const EDGE_FULLTEXT_SEARCH = `
  CALL db.index.fulltext.queryRelationships("${FULLTEXT_EDGE_INDEX}", $query, {limit: $limit})
  YIELD relationship AS e, score
  WHERE e.group_id = $groupId
  RETURN ${EDGE_COLUMNS}
  ORDER BY score DESC
  LIMIT $limit
`;

// Facts around entities whose name or summary matches the query.
export const EDGE_GRAPH_SEARCH = `
  CALL db.index.fulltext.queryNodes("${FULLTEXT_NODE_INDEX}", $query, {limit: $limit})
  YIELD node AS matched, score
  WHERE matched.group_id = $groupId
  MATCH (matched)-[e:RELATES_TO]-(:Entity)
  WITH e, max(score) AS score
  RETURN ${EDGE_COLUMNS}
  ORDER BY score DESC
  LIMIT $limit
`;

export const NODE_FULLTEXT_SEARCH = `
  CALL db.index.fulltext.queryNodes("${FULLTEXT_NODE_INDEX}", $query, {limit: $limit})
  YIELD node AS n, score
  WHERE n.group_id = $groupId
  RETURN ${NODE_COLUMNS}
  ORDER BY score DESC
  LIMIT $limit
`;

// Endpoints of facts that match the query.
export const NODE_GRAPH_SEARCH = `
  CALL db.index.fulltext.queryRelationships("${FULLTEXT_EDGE_INDEX}", $query, {limit: $limit})
  YIELD relationship AS e, score
  WHERE e.group_id = $groupId
  UNWIND [startNode(e), endNode(e)] AS n
  WITH n, max(score) AS score
  RETURN ${NODE_COLUMNS}
  ORDER BY score DESC
  LIMIT $limit
`;

export const NODE_DISTANCES = `
  MATCH (center:Entity {uuid: $centerNodeUuid})
  MATCH (n:Entity)
  WHERE n.uuid IN $nodeUuids AND n.uuid <> center.uuid
  MATCH p = shortestPath((center)-[:RELATES_TO*..${MAX_CENTER_DISTANCE}]-(n))
  RETURN n.uuid AS uuid, length(p) AS distance
`;
