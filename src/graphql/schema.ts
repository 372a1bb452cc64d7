export const typeDefs = `#graphql
  # ============================================================================
  # GAME DATA TYPES
  # ============================================================================
  type Stage {
    stageId: ID!
    levelId: String
    zoneId: String!
    code: String!
    name: String
  }

  type Zone {
    zoneId: ID!
    type: String
    zoneNameFirst: String
    zoneNameSecond: String
  }

  type Activity {
    id: ID!
    name: String!
    type: String
  }

  type Character {
    id: ID!
    name: String!
    profession: String
    rarity: String
  }

  type Tower {
    id: ID!
    name: String!
    subName: String
  }

  type SyncOutcome {
    dataset: String!
    ok: Boolean!
    count: Int
    levelCount: Int
    syncedAt: String
    kind: String
    message: String
    failedAt: String
  }

  type DatasetStatus {
    dataset: String!
    count: Int!
    lastOutcome: SyncOutcome
    lastSuccessAt: String
  }

  # ============================================================================
  # COPILOT TYPES
  # ============================================================================
  type LevelInfo {
    stageId: ID!
    code: String!
    name: String
    zoneName: String
    activityName: String
    towerName: String
  }

  type OperatorInfo {
    name: String!
    id: String
    skill: Int
    displayName: String
  }

  type Copilot {
    id: ID!
    uploaderId: ID!
    uploader: String!
    uploadTime: String!
    firstUploadTime: String!
    views: Int!
    title: String!
    details: String!
    stageName: String!
    content: String!
    level: LevelInfo
    operators: [OperatorInfo!]!
  }

  type CopilotPage {
    hasNext: Boolean!
    page: Int!
    total: Int!
    data: [Copilot!]!
  }

  enum CopilotOrder {
    id
    views
    uploadTime
  }

  # ============================================================================
  # ROOT QUERY
  # ============================================================================
  type Query {
    # Copilots
    copilot(id: ID!): Copilot
    copilots(
      page: Int
      limit: Int
      levelKeyword: String
      operator: String
      content: String
      uploaderId: ID
      orderBy: CopilotOrder
      desc: Boolean
    ): CopilotPage!

    # Game data
    stage(levelId: String, code: String, stageId: String): Stage
    zone(levelId: String, code: String, stageId: String): Zone
    tower(zoneId: ID!): Tower
    character(characterId: ID!): Character
    activityByZone(zoneId: ID!): Activity
    gameDataStatus: [DatasetStatus!]!
  }
`;
