import mongoose from "mongoose";
import type { CounterDoc, StudentDoc } from "../../types/recordTypes";

const StudentSchema = new mongoose.Schema<StudentDoc>({
  studentId: { type: Number, required: true, unique: true },
  name: { type: String, required: true },
  age: { type: Number, required: true },
  grade: { type: String, required: true },
  createdAt: { type: Date, default: Date.now },
});

const CounterSchema = new mongoose.Schema<CounterDoc>({
  _id: { type: String, required: true },
  seq: { type: Number, default: 0 },
});

export const StudentModel = mongoose.model<StudentDoc>("Student", StudentSchema);
export const CounterModel = mongoose.model<CounterDoc>("Counter", CounterSchema);
