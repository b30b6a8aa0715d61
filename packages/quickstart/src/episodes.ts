import type { EpisodeContent, EpisodeType } from "@episode-graph/graph-db";

export interface ExampleEpisode {
  content: EpisodeContent;
  type: EpisodeType;
  description: string;
}

export const EPISODE_NAME_PREFIX = "Harbor Town";

export const FACT_QUERY = "Who was the harbor master of Port Alder?";

export const NODE_QUERY = "Port Alder harbor master";

export const EXAMPLE_EPISODES: readonly ExampleEpisode[] = [
  {
    content:
      "Mira Okafor was elected harbor master of Port Alder in 2019. " +
      "Before that she ran the ferry office on Gull Island.",
    type: "text",
    description: "town gazette",
  },
  {
    content: "As harbor master she served from March 2019 to June 2024.",
    type: "text",
    description: "town gazette",
  },
  {
    content: {
      name: "Tomas Reyes",
      position: "Harbor Master",
      town: "Port Alder",
      term_start: "July 2024",
      previous_role: "Deputy Harbor Master",
    },
    type: "json",
    description: "council appointment record",
  },
  {
    content: {
      name: "Port Alder",
      county: "Alder County",
      population: 4200,
      harbor_master: "Tomas Reyes",
    },
    type: "json",
    description: "municipal registry entry",
  },
];
