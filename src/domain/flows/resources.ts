export interface Project {
  readonly id: number;
  readonly ownerId: number;
  readonly name: string;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

export interface Flow {
  readonly id: number;
  readonly projectId: number;
  readonly name: string;
  readonly description: string | null;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}
