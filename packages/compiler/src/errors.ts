/**
 * Compiler Errors
 *
 * Every failure aborts the whole compile. Messages name the offending
 * source file and key.
 *
 * @module compiler/errors
 */

export class CompilerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** A calibration or template file does not exist */
export class NotFoundError extends CompilerError {
  constructor(readonly path: string) {
    super(`File not found: ${path}`);
  }
}

/** A calibration file is not valid YAML */
export class ParseError extends CompilerError {
  constructor(readonly path: string, readonly detail: string) {
    super(`Failed to parse YAML file ${path}: ${detail}`);
  }
}

/** Content parsed, but has the wrong shape */
export class FormatError extends CompilerError {
  constructor(readonly source: string, readonly detail: string) {
    super(`Invalid calibration in ${source}: ${detail}`);
  }
}

/** A child frame lacks one of the six offset components */
export class MissingFieldError extends CompilerError {
  constructor(readonly childFrame: string, readonly field: string, readonly source: string) {
    super(`Missing field '${field}' for child frame '${childFrame}' in ${source}`);
  }
}

/** A link type has no macro entry */
export class DispatchGapError extends CompilerError {
  constructor(readonly linkType: string) {
    super(`No sensor macro registered for link type '${linkType}'`);
  }
}

/** A joint unit calibration declares another joint unit */
export class NestedJointUnitError extends CompilerError {
  constructor(readonly unit: string, readonly childFrame: string) {
    super(`Joint unit '${unit}' contains '${childFrame}', which is itself a joint unit; nested joint units are not supported`);
  }
}
