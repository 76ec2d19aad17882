/**
 * Python Emitter
 *
 * Pydantic v2 models, `str` enums, and a `GeneratedMethods` mixin class whose
 * methods call `self._make_request` and coerce the response. Mixins are
 * flattened into each model; their names are kept in `__mixins__` and as
 * "provided by" comments.
 */

import type { EnumDefinition, FieldSpec, MethodDefinition, ModelDefinition, PrimitiveType, TypeExpression } from '../core/definitions.js'
import { DATASET_WRAPPER, collectTypeNames } from '../core/definitions.js'
import { extractPythonMethods } from '../generators/spec-validator.js'
import type { ExistingMethod } from '../generators/spec-validator.js'
import type { EmittedFile, Emitter, GeneratedDefinitions, TargetLanguage } from './types.js'

const PRIMITIVES: Record<PrimitiveType, string> = {
  string: 'str',
  integer: 'int',
  number: 'float',
  boolean: 'bool',
  date: 'date',
  datetime: 'datetime',
  object: 'Dict[str, Any]',
  any: 'Any',
}

// Locals of every generated method body
const METHOD_LOCALS = ['self', 'path', 'params', 'response']

const MODEL_CONFIG = '    model_config = ConfigDict(extra="allow", populate_by_name=True)'

/** Python string literal. JSON escapes are valid Python escapes. */
export function pyString(value: string): string {
  return JSON.stringify(value)
}

/** Python literal for a JSON value */
export function pyLiteral(value: unknown): string {
  if (value === null || value === undefined) return 'None'
  if (typeof value === 'boolean') return value ? 'True' : 'False'
  if (typeof value === 'number') return Number.isFinite(value) ? String(value) : 'None'
  if (typeof value === 'string') return pyString(value)
  if (Array.isArray(value)) return `[${value.map(pyLiteral).join(', ')}]`
  if (typeof value === 'object') {
    const entries = Object.entries(value).map(([key, entry]) => `${pyString(key)}: ${pyLiteral(entry)}`)
    return `{${entries.join(', ')}}`
  }
  return pyString(String(value))
}

function docstring(text: string, indent: string): string[] {
  const escaped = text.replace(/\\/g, '\\\\').replace(/"""/g, '\\"\\"\\"').replace(/"$/, '\\"')
  const lines = escaped.split(/\r?\n/)
  if (lines.length === 1) return [`${indent}"""${escaped}"""`]
  return [`${indent}"""`, ...lines.map((line) => (line.trim() ? `${indent}${line}` : '')), `${indent}"""`]
}

function fileDocstring(title: string, info: GeneratedDefinitions['info']): string[] {
  return [
    '"""',
    `${title} for ${info.title} (version ${info.version}).`,
    '',
    'Auto-generated from OpenAPI specification.',
    'Do not edit manually - regenerate using bmrs-codegen.',
    '"""',
  ]
}

function importBlock(module: string, names: Iterable<string>): string[] {
  const sorted = [...new Set(names)].sort()
  if (sorted.length === 0) return []
  return [`from ${module} import (`, ...sorted.map((name) => `    ${name},`), ')']
}

/** Comment explaining requiredness that did not come from the schema alone */
function requirednessComment(field: FieldSpec): string | undefined {
  if (field.requiredness === 'inferred') {
    return field.nullableOverridden ? 'inferred required (overrides nullable)' : 'inferred required'
  }
  return field.nullableOverridden ? 'required (overrides nullable)' : undefined
}

export interface PythonEmitterOptions {
  reservedWords: Iterable<string>
}

export class PythonEmitter implements Emitter {
  readonly target: TargetLanguage = 'python'
  readonly reservedWords: ReadonlySet<string>

  constructor(options: PythonEmitterOptions) {
    this.reservedWords = new Set([...options.reservedWords, ...METHOD_LOCALS])
  }

  renderType(type: TypeExpression): string {
    switch (type.kind) {
      case 'primitive':
        return PRIMITIVES[type.name]
      case 'enum':
      case 'model':
        return type.name
      case 'list':
        return `List[${this.renderType(type.item)}]`
      case 'optional':
        return `Optional[${this.renderType(type.inner)}]`
      case 'wrapper':
        return `${type.wrapper}[${this.renderType(type.item)}]`
    }
  }

  emit(definitions: GeneratedDefinitions): EmittedFile[] {
    return [
      { path: 'enums.py', kind: 'enums', content: this.emitEnums(definitions) },
      { path: 'models.py', kind: 'models', content: this.emitModels(definitions) },
      { path: 'methods.py', kind: 'methods', content: this.emitMethods(definitions) },
      { path: '__init__.py', kind: 'index', content: this.emitIndex(definitions) },
    ]
  }

  extractMethods(source: string): ExistingMethod[] {
    return extractPythonMethods(source)
  }

  emitEnums(definitions: GeneratedDefinitions): string {
    const lines = [...fileDocstring('Enum types', definitions.info), '', 'from enum import Enum']

    for (const definition of definitions.enums) {
      lines.push('', '')
      lines.push(...this.emitEnum(definition))
    }

    lines.push('')
    return lines.join('\n')
  }

  private emitEnum(definition: EnumDefinition): string[] {
    return [
      `class ${definition.name}(str, Enum):`,
      `    """Enum for ${definition.fieldName} field values."""`,
      '',
      ...definition.members.map((member) => `    ${member.name} = ${pyString(member.value)}`),
    ]
  }

  emitModels(definitions: GeneratedDefinitions): string {
    const referenced = { enums: new Set<string>(), models: new Set<string>(), wrappers: new Set<string>() }
    for (const model of definitions.models) {
      for (const field of [...model.claimedFields, ...model.fields]) {
        collectTypeNames(field.type, referenced)
      }
    }

    const lines = [
      ...fileDocstring('Pydantic models', definitions.info),
      '',
      'from __future__ import annotations',
      '',
      'from datetime import date, datetime',
      'from typing import Any, ClassVar, Dict, Generic, List, Optional, Tuple, TypeVar',
      '',
      'from pydantic import BaseModel, ConfigDict, Field',
    ]

    const enumImports = importBlock('.enums', referenced.enums)
    if (enumImports.length > 0) lines.push('', ...enumImports)

    lines.push('', 'T = TypeVar("T")', '', '')
    lines.push(`class ${DATASET_WRAPPER}(BaseModel, Generic[T]):`)
    lines.push('    """Dataset envelope: rows under ``data``, anything else passed through."""')
    lines.push('')
    lines.push(MODEL_CONFIG)
    lines.push('')
    lines.push('    data: List[T] = Field(default_factory=list)')

    for (const model of definitions.models) {
      lines.push('', '')
      lines.push(...this.emitModel(model))
    }

    lines.push('')
    return lines.join('\n')
  }

  private emitModel(model: ModelDefinition): string[] {
    const lines = [`class ${model.name}(BaseModel):`]
    if (model.description) {
      lines.push(...docstring(model.description, '    '), '')
    }
    lines.push(MODEL_CONFIG)
    if (model.mixins.length > 0) {
      const names = model.mixins.map((mixin) => pyString(mixin.name))
      const tuple = names.length === 1 ? `(${names[0]},)` : `(${names.join(', ')})`
      lines.push(`    __mixins__: ClassVar[Tuple[str, ...]] = ${tuple}`)
    }

    for (const mixin of model.mixins) {
      const provided = model.claimedFields.filter((field) => field.providedBy === mixin.name)
      if (provided.length === 0) continue
      lines.push('', `    # provided by ${mixin.name}`)
      lines.push(...provided.map((field) => this.emitField(field)))
    }

    if (model.fields.length > 0) {
      lines.push('')
      lines.push(...model.fields.map((field) => this.emitField(field)))
    }

    return lines
  }

  private emitField(field: FieldSpec): string {
    const params: string[] = []
    if (!field.required) params.push('default=None')
    if (field.alias !== undefined) params.push(`alias=${pyString(field.alias)}`)
    if (field.description) params.push(`description=${pyString(field.description)}`)
    if (field.example !== undefined && field.example !== null) {
      params.push(`examples=[${pyLiteral(field.example)}]`)
    }

    let line = `    ${field.name}: ${this.renderType(field.type)}`
    if (params.length === 1 && params[0] === 'default=None') {
      line += ' = None'
    } else if (params.length > 0) {
      line += ` = Field(${params.join(', ')})`
    }

    const comment = requirednessComment(field)
    return comment ? `${line}  # ${comment}` : line
  }

  emitMethods(definitions: GeneratedDefinitions): string {
    const referenced = { enums: new Set<string>(), models: new Set<string>(), wrappers: new Set<string>() }
    for (const method of definitions.methods) {
      collectTypeNames(method.responseType, referenced)
    }

    const lines = [
      ...fileDocstring('Client methods', definitions.info),
      '',
      'from __future__ import annotations',
      '',
      'import logging',
      'from typing import Any, Dict, List, Optional',
      '',
      'from pydantic import TypeAdapter, ValidationError',
    ]

    const modelImports = importBlock('.models', [...referenced.models, ...referenced.wrappers])
    if (modelImports.length > 0) lines.push('', ...modelImports)

    lines.push(
      '',
      'logger = logging.getLogger(__name__)',
      '',
      '',
      'def _coerce_response(method_name: str, raw: Any, expected: Any) -> Any:',
      '    """Validate a response body; on mismatch log a warning and return the raw data."""',
      '    try:',
      '        return TypeAdapter(expected).validate_python(raw)',
      '    except ValidationError as exc:',
      '        logger.warning("Response from %s did not match the expected type: %s", method_name, exc)',
      '        return raw',
      '',
      '',
      'class GeneratedMethods:',
      '    """Endpoint bindings. Mix into a client that implements ``_make_request``."""',
      '',
      '    def _make_request(self, method: str, path: str, params: Optional[Dict[str, Any]] = None) -> Any:',
      '        raise NotImplementedError',
    )

    for (const method of definitions.methods) {
      lines.push('')
      lines.push(...this.emitMethod(method))
    }

    lines.push('')
    return lines.join('\n')
  }

  private emitMethod(method: MethodDefinition): string[] {
    const returnType = this.renderType(method.responseType)
    const signature = ['self']
    for (const param of method.parameters) {
      const type = this.renderType(param.type)
      signature.push(param.required ? `${param.name}: ${type}` : `${param.name}: Optional[${type}] = None`)
    }

    const lines: string[] = []
    if (signature.length === 1) {
      lines.push(`    def ${method.name}(self) -> ${returnType}:`)
    } else {
      lines.push(`    def ${method.name}(`)
      lines.push(...signature.map((part) => `        ${part},`))
      lines.push(`    ) -> ${returnType}:`)
    }

    lines.push(...docstring(this.methodDoc(method, returnType), '        '))

    const hasPathParams = method.parameters.some((param) => param.location === 'path')
    lines.push(`        path = ${hasPathParams ? 'f' : ''}${pyString(method.path)}`)

    const query = method.parameters.filter((param) => param.location === 'query')
    if (query.length > 0) {
      lines.push('        params: Dict[str, Any] = {}')
      for (const param of query) {
        if (param.required) {
          lines.push(`        params[${pyString(param.wireName)}] = ${param.name}`)
        } else {
          lines.push(`        if ${param.name} is not None:`)
          lines.push(`            params[${pyString(param.wireName)}] = ${param.name}`)
        }
      }
      lines.push(`        response = self._make_request(${pyString(method.httpMethod)}, path, params=params)`)
    } else {
      lines.push(`        response = self._make_request(${pyString(method.httpMethod)}, path)`)
    }

    if (method.coerceResponse) {
      lines.push(`        return _coerce_response(${pyString(method.name)}, response, ${returnType})`)
    } else {
      lines.push('        return response')
    }

    return lines
  }

  private methodDoc(method: MethodDefinition, returnType: string): string {
    const parts = [method.summary ?? `${method.httpMethod} ${method.wirePath}`]
    if (method.description && method.description !== method.summary) parts.push('', method.description)
    if (method.deprecated) parts.push('', 'Deprecated.')

    if (method.parameters.length > 0) {
      parts.push('', 'Args:')
      for (const param of method.parameters) {
        parts.push(`    ${param.name}: ${param.description ?? param.wireName}`.trimEnd())
      }
    }

    parts.push('', 'Returns:')
    parts.push(
      method.coerceResponse
        ? `    ${returnType}, or the raw response data if it does not match`
        : `    ${returnType}`,
    )
    return parts.join('\n')
  }

  private emitIndex(definitions: GeneratedDefinitions): string {
    return [
      `"""Generated bindings for ${definitions.info.title}."""`,
      '',
      'from .enums import *  # noqa: F401,F403',
      'from .methods import GeneratedMethods  # noqa: F401',
      'from .models import *  # noqa: F401,F403',
      '',
    ].join('\n')
  }
}
