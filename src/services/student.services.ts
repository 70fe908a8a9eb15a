import crypto from "crypto";
import type { RiasecScores, StudentProfile } from "../types";
import { HttpError } from "../utils/errors";
import { componentLogger } from "../utils/logger";
import type { CareerAnalysisService } from "./career-analysis.services";

const log = componentLogger("student-store");

export type StoredStudent = StudentProfile & { id: string };

/**
 * In-memory student profile store. Any change to a stored profile drops the
 * student's cached analyses before the change becomes visible.
 */
export class StudentService {
  private readonly students = new Map<string, StoredStudent>();

  constructor(private readonly analysisService: CareerAnalysisService) {}

  /**
   * Registers a profile, generating an id when none is given.
   * @throws HttpError 409 if the id is already taken.
   */
  register(profile: StudentProfile): StoredStudent {
    const id = profile.id?.trim() || crypto.randomUUID();
    if (this.students.has(id)) {
      throw new HttpError(409, `Student ${id} already exists`);
    }

    const student: StoredStudent = { ...profile, id };
    this.students.set(id, student);
    log.info("Student registered", { studentId: id });
    return { ...student };
  }

  findById(studentId: string): StoredStudent | undefined {
    const student = this.students.get(studentId);
    return student ? { ...student } : undefined;
  }

  /**
   * @throws HttpError 404 for an unknown student.
   */
  getById(studentId: string): StoredStudent {
    const student = this.findById(studentId);
    if (!student) {
      throw new HttpError(404, `Student ${studentId} not found`);
    }
    return student;
  }

  /**
   * Merges `changes` into the stored profile. RIASEC scores merge per axis.
   * @throws HttpError 404 for an unknown student.
   */
  update(studentId: string, changes: Omit<StudentProfile, "id">): StoredStudent {
    const current = this.getById(studentId);
    const riasecScores =
      changes.riasecScores === undefined
        ? current.riasecScores
        : changes.riasecScores === null
          ? null
          : { ...current.riasecScores, ...changes.riasecScores };

    const updated: StoredStudent = {
      ...current,
      ...changes,
      riasecScores,
      id: studentId,
    };

    this.analysisService.invalidateStudent(studentId);
    this.students.set(studentId, updated);
    log.info("Student profile updated", {
      studentId,
      fields: Object.keys(changes),
    });
    return { ...updated };
  }

  updateRiasecScores(studentId: string, scores: RiasecScores): StoredStudent {
    return this.update(studentId, { riasecScores: { ...scores } });
  }
}
