import { CounterModel, StudentModel } from "../model/ragModel/studentModel";
import type { StudentInput, StudentRecord } from "../types/recordTypes";
import type { RecordStore } from "./recordStore";

const COUNTER_KEY = "studentId";

export class MongoRecordStore implements RecordStore {
  private async nextId() {
    const counter = await CounterModel.findOneAndUpdate(
      { _id: COUNTER_KEY },
      { $inc: { seq: 1 } },
      { new: true, upsert: true }
    ).lean();
    if (!counter) throw new Error("Failed to allocate student id");
    return counter.seq;
  }

  async insert(input: StudentInput): Promise<StudentRecord> {
    const studentId = await this.nextId();
    await StudentModel.create({ studentId, ...input });
    return { id: studentId, ...input };
  }

  async fetchAll(): Promise<StudentRecord[]> {
    const docs = await StudentModel.find().sort({ studentId: 1 }).lean();
    return docs.map((d) => ({
      id: d.studentId,
      name: d.name,
      age: d.age,
      grade: d.grade,
    }));
  }

  async update(id: number, input: StudentInput) {
    const res = await StudentModel.updateOne({ studentId: id }, { $set: input });
    return res.matchedCount > 0;
  }

  async delete(id: number) {
    const res = await StudentModel.deleteOne({ studentId: id });
    return res.deletedCount > 0;
  }
}
