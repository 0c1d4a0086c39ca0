/**
 * Source model: the facts a language frontend reports about a codebase.
 *
 * ```yaml
 * basePackage: com.acme
 * types:
 *   - qualifiedName: com.acme.order.Order
 *     form: class
 *     annotations: [AggregateRoot]
 *     fields:
 *       - { name: id, type: com.acme.order.OrderId, modifiers: [private, final] }
 *       - { name: lines, type: 'java.util.List<com.acme.order.OrderLine>' }
 * ```
 */
import { z } from 'zod';
import { parseTypeRef, typeRef, type TypeRef } from '../graph/type-ref.js';
import type { Annotation, TypeForm } from '../graph/types.js';
import { annotation } from '../graph/nodes.js';

export const ModifierSchema = z.enum([
  'public',
  'protected',
  'private',
  'abstract',
  'static',
  'final',
  'default',
  'sealed',
]);

export const TypeFormSchema = z
  .enum(['class', 'interface', 'record', 'enum', 'annotation'])
  .transform((form): TypeForm => {
    switch (form) {
      case 'class':
        return 'CLASS';
      case 'interface':
        return 'INTERFACE';
      case 'record':
        return 'RECORD';
      case 'enum':
        return 'ENUM';
      case 'annotation':
        return 'ANNOTATION';
    }
  });

interface TypeRefInput {
  name: string;
  arguments?: TypeRefInput[];
  arrayDimensions?: number;
}

const TypeRefObjectSchema: z.ZodType<TypeRefInput> = z.lazy(() =>
  z.object({
    name: z.string().min(1),
    arguments: z.array(TypeRefObjectSchema).optional(),
    arrayDimensions: z.number().int().min(0).optional(),
  })
);

function fromInput(input: TypeRefInput): TypeRef {
  return typeRef(input.name, (input.arguments ?? []).map(fromInput), input.arrayDimensions ?? 0);
}

/** Either 'java.util.List<com.acme.Order>' or { name, arguments, arrayDimensions }. */
export const TypeRefSchema = z.union([z.string().min(1), TypeRefObjectSchema]).transform(
  (value, ctx): TypeRef => {
    if (typeof value !== 'string') {
      return fromInput(value);
    }
    try {
      return parseTypeRef(value);
    } catch (error) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: error instanceof Error ? error.message : `Invalid type reference '${value}'`,
      });
      return z.NEVER;
    }
  }
);

export const AnnotationSchema = z
  .union([
    z.string().min(1),
    z.object({ name: z.string().min(1), values: z.record(z.string(), z.unknown()).default({}) }),
  ])
  .transform((value): Annotation =>
    typeof value === 'string' ? annotation(value) : annotation(value.name, value.values)
  );

const modifiers = z.array(ModifierSchema).default([]);
const annotations = z.array(AnnotationSchema).default([]);

export const ParameterSchema = z.object({
  name: z.string().default(''),
  type: TypeRefSchema,
});

export const FieldDeclarationSchema = z.object({
  name: z.string().min(1),
  type: TypeRefSchema,
  modifiers,
  annotations,
});

export const MethodDeclarationSchema = z.object({
  name: z.string().min(1),
  returnType: TypeRefSchema.default('void'),
  parameters: z.array(ParameterSchema).default([]),
  modifiers,
  annotations,
});

export const ConstructorDeclarationSchema = z.object({
  parameters: z.array(ParameterSchema).default([]),
  modifiers,
  annotations,
});

export const TypeDeclarationSchema = z.object({
  qualifiedName: z.string().min(1),
  form: TypeFormSchema,
  modifiers,
  annotations,
  superType: TypeRefSchema.optional(),
  interfaces: z.array(TypeRefSchema).default([]),
  fields: z.array(FieldDeclarationSchema).default([]),
  methods: z.array(MethodDeclarationSchema).default([]),
  constructors: z.array(ConstructorDeclarationSchema).default([]),
  sourceFile: z.string().optional(),
});

export const SourceModelSchema = z.object({
  basePackage: z.string().default(''),
  languageLevel: z.string().optional(),
  sourceUnitCount: z.number().int().min(0).optional(),
  types: z.array(TypeDeclarationSchema).default([]),
});

// Type exports (inferred from schemas)
export type ParameterDeclaration = z.infer<typeof ParameterSchema>;
export type FieldDeclaration = z.infer<typeof FieldDeclarationSchema>;
export type MethodDeclaration = z.infer<typeof MethodDeclarationSchema>;
export type ConstructorDeclaration = z.infer<typeof ConstructorDeclarationSchema>;
export type TypeDeclaration = z.infer<typeof TypeDeclarationSchema>;
export type SourceModel = z.infer<typeof SourceModelSchema>;
/** Input shapes before defaults and transforms are applied. */
export type TypeDeclarationInput = z.input<typeof TypeDeclarationSchema>;
export type SourceModelInput = z.input<typeof SourceModelSchema>;
