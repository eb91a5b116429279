/**
 * Argument coercion backed by class-validator.
 *
 * Argument classes are declared the same way request DTOs are: decorated
 * properties, validated with unknown properties rejected.
 */

import "reflect-metadata";
import { ClassConstructor, plainToInstance } from "class-transformer";
import { ValidationError, validate } from "class-validator";

import { CoerceArgsFn, CompilationError } from "./types.js";

function collectConstraintMessages(errors: ValidationError[]): string[] {
	return errors.flatMap((error) => [
		...Object.values(error.constraints ?? {}),
		...collectConstraintMessages(error.children ?? []),
	]);
}

/**
 * Build a coercion function turning plain stateful arguments into an
 * instance of `cls`, or throwing `ARGUMENT_COERCION_FAILURE` with one reason
 * per violated constraint.
 *
 * @example
 * ```typescript
 * class SettleArgs {
 *   @IsInt()
 *   @Min(0)
 *   receiverShare!: number;
 * }
 * const coerce = coerceWith(SettleArgs);
 * await coerce({ receiverShare: 40_000 }); // SettleArgs { receiverShare: 40000 }
 * ```
 */
export function coerceWith<T extends object>(
	cls: ClassConstructor<T>,
): CoerceArgsFn<unknown, T> {
	return async (args: unknown): Promise<T> => {
		if (typeof args !== "object" || args === null || Array.isArray(args)) {
			throw new CompilationError("ARGUMENT_COERCION_FAILURE", [
				`expected an object for ${cls.name}, got ${Array.isArray(args) ? "array" : args === null ? "null" : typeof args}`,
			]);
		}

		const instance = plainToInstance(cls, args);
		const errors = await validate(instance, {
			whitelist: true,
			forbidNonWhitelisted: true,
		});
		if (errors.length > 0) {
			throw new CompilationError(
				"ARGUMENT_COERCION_FAILURE",
				collectConstraintMessages(errors),
				undefined,
				{ target: cls.name, errors },
			);
		}
		return instance;
	};
}

/**
 * Coerce by selecting one property of the stateful arguments and validating
 * it as `cls`. Useful when the contract-wide arguments are an envelope keyed
 * by branch name.
 */
export function coerceField<T extends object>(
	field: string,
	cls: ClassConstructor<T>,
): CoerceArgsFn<unknown, T> {
	const coerce = coerceWith(cls);
	return async (args: unknown): Promise<T> => {
		if (typeof args !== "object" || args === null || !(field in args)) {
			throw new CompilationError("ARGUMENT_COERCION_FAILURE", [
				`missing "${field}" in stateful arguments`,
			]);
		}
		return coerce(Reflect.get(args, field));
	};
}
