export interface Comment {
  id: string;
  taskId: number;
  userId: number;
  text: string;
  createdAt: Date;
}
