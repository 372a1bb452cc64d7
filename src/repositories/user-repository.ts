import AWS from 'aws-sdk';
import { z } from 'zod';
import { INDEX_NAMES, TABLE_NAMES } from '../config/tableNames';

export type UserStatus = 0 | 1;

export interface UserRecord {
  userId: string;
  userName: string;
  email: string;
  /** bcrypt hash */
  password: string;
  status: UserStatus;
  createdAt: number;
  updatedAt: number;
}

export interface UserRepository {
  findByEmail(email: string): Promise<UserRecord | null>;
  /** Rejects with DuplicateUserError when the email is already registered. */
  create(user: UserRecord): Promise<UserRecord>;
  save(user: UserRecord): Promise<UserRecord>;
}

export class DuplicateUserError extends Error {
  constructor(email: string) {
    super(`User with email ${email} already exists`);
    this.name = 'DuplicateUserError';
  }
}

const userItemSchema = z.object({
  UserId: z.string(),
  UserName: z.string(),
  Email: z.string(),
  Password: z.string(),
  Status: z.union([z.literal(0), z.literal(1)]),
  CreatedAt: z.number(),
  UpdatedAt: z.number()
});

const toRecord = (item: unknown): UserRecord => {
  const parsed = userItemSchema.parse(item);
  return {
    userId: parsed.UserId,
    userName: parsed.UserName,
    email: parsed.Email,
    password: parsed.Password,
    status: parsed.Status,
    createdAt: parsed.CreatedAt,
    updatedAt: parsed.UpdatedAt
  };
};

const toItem = (user: UserRecord) => ({
  UserId: user.userId,
  UserName: user.userName,
  Email: user.email,
  Password: user.password,
  Status: user.status,
  CreatedAt: user.createdAt,
  UpdatedAt: user.updatedAt
});

export class DynamoUserRepository implements UserRepository {
  constructor(
    private readonly dynamodb: AWS.DynamoDB.DocumentClient,
    private readonly tableName: string = TABLE_NAMES.USERS
  ) {}

  async findByEmail(email: string): Promise<UserRecord | null> {
    const result = await this.dynamodb
      .query({
        TableName: this.tableName,
        IndexName: INDEX_NAMES.USERS_BY_EMAIL,
        KeyConditionExpression: '#email = :email',
        ExpressionAttributeNames: { '#email': 'Email' },
        ExpressionAttributeValues: { ':email': email },
        Limit: 1
      })
      .promise();
    const [item] = result.Items ?? [];
    return item ? toRecord(item) : null;
  }

  async create(user: UserRecord): Promise<UserRecord> {
    if (await this.findByEmail(user.email)) {
      throw new DuplicateUserError(user.email);
    }
    await this.dynamodb
      .put({
        TableName: this.tableName,
        Item: toItem(user),
        ConditionExpression: 'attribute_not_exists(UserId)'
      })
      .promise();
    return user;
  }

  async save(user: UserRecord): Promise<UserRecord> {
    await this.dynamodb
      .put({
        TableName: this.tableName,
        Item: toItem(user)
      })
      .promise();
    return user;
  }
}
