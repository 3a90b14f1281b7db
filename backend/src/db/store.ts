import type Database from "better-sqlite3";
import type { AssessmentStore, ChatEntry, CodeSnapshot, Project } from "../types";

type ProjectRow = Omit<Project, "is_favorite"> & { is_favorite: number };

function toProject(row: ProjectRow): Project {
  return { ...row, is_favorite: row.is_favorite !== 0 };
}

export class SqliteAssessmentStore implements AssessmentStore {
  constructor(private readonly db: Database.Database) {}

  appendChat(userMessage: string, aiResponse: string): number {
    const info = this.db
      .prepare("INSERT INTO chat_history (user_message, ai_response, created_at) VALUES (?, ?, ?)")
      .run(userMessage, aiResponse, new Date().toISOString());
    return Number(info.lastInsertRowid);
  }

  insertCodeSnapshot(code: string, language: string): number {
    const info = this.db
      .prepare("INSERT INTO code_snapshots (code, language, created_at) VALUES (?, ?, ?)")
      .run(code, language, new Date().toISOString());
    return Number(info.lastInsertRowid);
  }

  insertProject(name: string, code: string, language: string): number {
    const info = this.db
      .prepare("INSERT INTO projects (project_name, code, language, is_favorite, created_at) VALUES (?, ?, ?, 0, ?)")
      .run(name, code, language, new Date().toISOString());
    return Number(info.lastInsertRowid);
  }

  listProjects(): Project[] {
    const rows = this.db
      .prepare("SELECT id, project_name, code, language, is_favorite, created_at FROM projects ORDER BY id ASC")
      .all() as ProjectRow[];
    return rows.map(toProject);
  }

  setFavorite(id: number, favorite: boolean): boolean {
    const info = this.db.prepare("UPDATE projects SET is_favorite = ? WHERE id = ?").run(favorite ? 1 : 0, id);
    return info.changes > 0;
  }

  deleteProject(id: number): boolean {
    const info = this.db.prepare("DELETE FROM projects WHERE id = ?").run(id);
    return info.changes > 0;
  }

  latestSnapshot(): CodeSnapshot | undefined {
    return this.db
      .prepare("SELECT id, code, language, created_at FROM code_snapshots ORDER BY id DESC LIMIT 1")
      .get() as CodeSnapshot | undefined;
  }

  listChat(): ChatEntry[] {
    return this.db
      .prepare("SELECT id, user_message, ai_response, created_at FROM chat_history ORDER BY id ASC")
      .all() as ChatEntry[];
  }
}
