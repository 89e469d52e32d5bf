export interface StudentRecord {
  id: number;
  name: string;
  age: number;
  grade: string;
}

export type StudentInput = Omit<StudentRecord, "id">;

/** Stored shape; `studentId` is the numeric key handed out by the counter. */
export interface StudentDoc {
  studentId: number;
  name: string;
  age: number;
  grade: string;
  createdAt?: Date;
}

export interface CounterDoc {
  _id: string;
  seq: number;
}
