// Cypher for episodes, entities and facts

export const CREATE_EPISODE = `
  CREATE (ep:Episodic {uuid: $uuid})
  SET ep.name = $name, ep.content = $content, ep.source = $source,
      ep.source_description = $sourceDescription, ep.valid_at = $validAt,
      ep.created_at = $createdAt, ep.group_id = $groupId
`;

export const GET_EPISODE = `
  MATCH (ep:Episodic {uuid: $uuid})
  RETURN ep.uuid AS uuid, ep.name AS name, ep.content AS content, ep.source AS source,
         ep.source_description AS sourceDescription, ep.valid_at AS validAt,
         ep.created_at AS createdAt, ep.group_id AS groupId
`;

// Mirrors mergeEntity(): labels union, latest non-empty summary/attributes win.
export const MERGE_ENTITY = `
  MERGE (n:Entity {name_key: $nameKey, group_id: $groupId})
  ON CREATE SET n.uuid = $uuid, n.name = $name, n.created_at = $createdAt,
                n.labels = $labels, n.summary = $summary, n.attributes = $attributes
  ON MATCH SET n.labels = reduce(acc = n.labels, label IN $labels |
                 CASE WHEN label IN acc THEN acc ELSE acc + label END),
               n.summary = CASE WHEN $summary = '' THEN n.summary ELSE $summary END,
               n.attributes = CASE WHEN $attributes = '{}' THEN n.attributes ELSE $attributes END
  WITH n
  MATCH (ep:Episodic {uuid: $episodeUuid})
  MERGE (ep)-[:MENTIONS]->(n)
  RETURN n.uuid AS uuid, n.name AS name, n.summary AS summary, n.labels AS labels,
         n.created_at AS createdAt, n.attributes AS attributes, n.group_id AS groupId
`;

export const CREATE_FACT = `
  MATCH (s:Entity {uuid: $sourceNodeUuid}), (t:Entity {uuid: $targetNodeUuid})
  CREATE (s)-[e:RELATES_TO {uuid: $uuid}]->(t)
  SET e.name = $name, e.fact = $fact, e.episodes = $episodes,
      e.valid_at = $validAt, e.invalid_at = $invalidAt,
      e.created_at = $createdAt, e.group_id = $groupId
`;
