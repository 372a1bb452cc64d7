import AWS from 'aws-sdk';
import { z } from 'zod';
import { TABLE_NAMES } from '../config/tableNames';

export interface OperatorRef {
  name: string;
  id: string | null;
  skill: number | null;
}

export interface CopilotRecord {
  id: string;
  uploaderId: string;
  uploader: string;
  /** Raw JSON document as uploaded. */
  content: string;
  stageName: string;
  stageCode: string | null;
  title: string;
  details: string;
  operators: OperatorRef[];
  views: number;
  uploadTime: number;
  firstUploadTime: number;
  deleted: boolean;
  deleteTime: number | null;
}

export interface CopilotRepository {
  findById(id: string): Promise<CopilotRecord | null>;
  insert(record: CopilotRecord): Promise<CopilotRecord>;
  save(record: CopilotRecord): Promise<CopilotRecord>;
  incrementViews(id: string): Promise<void>;
  listActive(): Promise<CopilotRecord[]>;
}

const copilotItemSchema = z.object({
  CopilotId: z.string(),
  UploaderId: z.string(),
  Uploader: z.string(),
  Content: z.string(),
  StageName: z.string(),
  StageCode: z.string().nullable(),
  Title: z.string(),
  Details: z.string(),
  Operators: z.array(
    z.object({
      Name: z.string(),
      Id: z.string().nullable(),
      Skill: z.number().nullable()
    })
  ),
  Views: z.number(),
  UploadTime: z.number(),
  FirstUploadTime: z.number(),
  Deleted: z.boolean(),
  DeleteTime: z.number().nullable()
});

const toRecord = (item: unknown): CopilotRecord => {
  const parsed = copilotItemSchema.parse(item);
  return {
    id: parsed.CopilotId,
    uploaderId: parsed.UploaderId,
    uploader: parsed.Uploader,
    content: parsed.Content,
    stageName: parsed.StageName,
    stageCode: parsed.StageCode,
    title: parsed.Title,
    details: parsed.Details,
    operators: parsed.Operators.map((operator) => ({
      name: operator.Name,
      id: operator.Id,
      skill: operator.Skill
    })),
    views: parsed.Views,
    uploadTime: parsed.UploadTime,
    firstUploadTime: parsed.FirstUploadTime,
    deleted: parsed.Deleted,
    deleteTime: parsed.DeleteTime
  };
};

const toItem = (record: CopilotRecord) => ({
  CopilotId: record.id,
  UploaderId: record.uploaderId,
  Uploader: record.uploader,
  Content: record.content,
  StageName: record.stageName,
  StageCode: record.stageCode,
  Title: record.title,
  Details: record.details,
  Operators: record.operators.map((operator) => ({
    Name: operator.name,
    Id: operator.id,
    Skill: operator.skill
  })),
  Views: record.views,
  UploadTime: record.uploadTime,
  FirstUploadTime: record.firstUploadTime,
  Deleted: record.deleted,
  DeleteTime: record.deleteTime
});

export class DynamoCopilotRepository implements CopilotRepository {
  constructor(
    private readonly dynamodb: AWS.DynamoDB.DocumentClient,
    private readonly tableName: string = TABLE_NAMES.COPILOTS
  ) {}

  async findById(id: string): Promise<CopilotRecord | null> {
    const result = await this.dynamodb
      .get({
        TableName: this.tableName,
        Key: { CopilotId: id }
      })
      .promise();
    return result.Item ? toRecord(result.Item) : null;
  }

  async insert(record: CopilotRecord): Promise<CopilotRecord> {
    await this.dynamodb
      .put({
        TableName: this.tableName,
        Item: toItem(record),
        ConditionExpression: 'attribute_not_exists(CopilotId)'
      })
      .promise();
    return record;
  }

  async save(record: CopilotRecord): Promise<CopilotRecord> {
    await this.dynamodb
      .put({
        TableName: this.tableName,
        Item: toItem(record)
      })
      .promise();
    return record;
  }

  async incrementViews(id: string): Promise<void> {
    await this.dynamodb
      .update({
        TableName: this.tableName,
        Key: { CopilotId: id },
        UpdateExpression: 'ADD #views :one',
        ExpressionAttributeNames: { '#views': 'Views' },
        ExpressionAttributeValues: { ':one': 1 }
      })
      .promise();
  }

  async listActive(): Promise<CopilotRecord[]> {
    const records: CopilotRecord[] = [];
    let startKey: AWS.DynamoDB.DocumentClient.Key | undefined;
    do {
      const result = await this.dynamodb
        .scan({
          TableName: this.tableName,
          FilterExpression: '#deleted = :false',
          ExpressionAttributeNames: { '#deleted': 'Deleted' },
          ExpressionAttributeValues: { ':false': false },
          ExclusiveStartKey: startKey
        })
        .promise();
      (result.Items ?? []).forEach((item) => records.push(toRecord(item)));
      startKey = result.LastEvaluatedKey;
    } while (startKey);
    return records;
  }
}
