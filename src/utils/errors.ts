export const ErrorCode = {
  PathNotFound: 'PathNotFound',
  AccessDenied: 'AccessDenied',
  MalformedTask: 'MalformedTask',
  TaskNotFound: 'TaskNotFound',
  CycleDetected: 'CycleDetected',
  DanglingDependency: 'DanglingDependency',
  NameCollision: 'NameCollision',
  InvalidComplexity: 'InvalidComplexity',
  InvalidDomain: 'InvalidDomain',
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

export class AppError extends Error {
  public readonly errorCode: ErrorCodeValue;
  public readonly details: unknown;

  constructor(errorCode: ErrorCodeValue, message: string, details?: unknown) {
    super(message);
    this.errorCode = errorCode;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = new.target.name;
  }

  public toJSON(): { code: ErrorCodeValue; message: string; details?: unknown } {
    return this.details === undefined
      ? { code: this.errorCode, message: this.message }
      : { code: this.errorCode, message: this.message, details: this.details };
  }
}

export class PathNotFoundError extends AppError {
  constructor(projectPath: string) {
    super(ErrorCode.PathNotFound, `Project path ${projectPath} does not exist`, { project_path: projectPath });
  }
}

export class AccessDeniedError extends AppError {
  constructor(projectPath: string) {
    super(ErrorCode.AccessDenied, `Access denied: ${projectPath} is not allowed for security reasons`, {
      project_path: projectPath,
    });
  }
}

export class MalformedTaskError extends AppError {
  constructor(message = 'Every task entry in the project is malformed', details?: unknown) {
    super(ErrorCode.MalformedTask, message, details);
  }
}

export class TaskNotFoundError extends AppError {
  constructor(taskName: string, availableTasks: string[]) {
    super(ErrorCode.TaskNotFound, `Task '${taskName}' not found`, {
      task_name: taskName,
      available_tasks: availableTasks,
    });
  }
}

export class CycleDetectedError extends AppError {
  public readonly members: string[];

  constructor(members: string[]) {
    super(ErrorCode.CycleDetected, `Circular dependency detected among: ${members.join(', ')}`, { members });
    this.members = members;
  }
}

export class DanglingDependencyError extends AppError {
  constructor(taskName: string, references: string[]) {
    super(
      ErrorCode.DanglingDependency,
      `Task '${taskName}' depends on tasks that do not exist: ${references.join(', ')}`,
      { task_name: taskName, references }
    );
  }
}

export class NameCollisionError extends AppError {
  constructor(fullName: string) {
    super(ErrorCode.NameCollision, `A task named '${fullName}' already exists`, { full_name: fullName });
  }
}

export class InvalidComplexityError extends AppError {
  constructor(value: string, allowed: readonly string[]) {
    super(ErrorCode.InvalidComplexity, `Invalid complexity '${value}'. Must be one of: ${allowed.join(', ')}`, {
      value,
      allowed,
    });
  }
}

export class InvalidDomainError extends AppError {
  constructor(value: string, allowed: readonly string[]) {
    super(ErrorCode.InvalidDomain, `Invalid domain '${value}'. Must be one of: ${allowed.join(', ')}`, {
      value,
      allowed,
    });
  }
}
