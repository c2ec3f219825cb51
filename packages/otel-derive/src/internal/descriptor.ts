import {
  Node,
  type ClassDeclaration,
  type EnumDeclaration,
  type InterfaceDeclaration,
  type TypeAliasDeclaration,
  VariableDeclarationKind,
} from 'ts-morph'

import { fail, problem, succeed, type Checked } from './diagnostic.js'
import { DiagnosticCodes, ReasonCodes } from './reasonCodes.js'
import type { Range } from './span.js'

export type TypeShape = 'Struct' | 'Enum'

export type TypeDescriptor = {
  readonly name: string
  readonly shape: TypeShape
  /** Range of the declared name. */
  readonly range: Range
}

const rangeOf = (node: Node): Range => ({ start: node.getStart(), end: node.getEnd() })

const describeItemKind = (node: Node): string => {
  if (Node.isFunctionDeclaration(node)) return 'a function'
  if (Node.isVariableStatement(node)) return node.getDeclarationKind() === VariableDeclarationKind.Const ? 'a constant' : 'a variable'
  if (Node.isModuleDeclaration(node)) return 'a namespace'
  return `a ${node.getKindName()}`
}

type TypeDeclaration = ClassDeclaration | InterfaceDeclaration | TypeAliasDeclaration | EnumDeclaration

const describeDeclaration = (node: TypeDeclaration, shape: TypeShape): Checked<TypeDescriptor> => {
  const nameNode = node.getNameNode()
  if (!nameNode) {
    return fail(
      problem(
        DiagnosticCodes.unsupportedItemKind,
        ReasonCodes.itemAnonymous,
        'conversions cannot be derived for an anonymous class',
        rangeOf(node),
        'give the class a name',
      ),
    )
  }

  const name = nameNode.getText()
  if (node.isDefaultExport()) {
    return fail(
      problem(
        DiagnosticCodes.unsupportedItemKind,
        ReasonCodes.itemDefaultExport,
        `type \`${name}\` is a default export; conversions can only be derived for named exports`,
        rangeOf(nameNode),
        `drop \`default\` and import \`${name}\` by name where it is used`,
      ),
    )
  }

  if (!node.isExported()) {
    return fail(
      problem(
        DiagnosticCodes.unsupportedItemKind,
        ReasonCodes.itemNotExported,
        `type \`${name}\` must be exported to derive conversions for it`,
        rangeOf(nameNode),
        `add \`export\` to the declaration of \`${name}\``,
      ),
    )
  }

  const typeParameters = Node.isTypeParametered(node) ? node.getTypeParameters() : []
  const first = typeParameters[0]
  const last = typeParameters[typeParameters.length - 1]
  if (first && last) {
    return fail(
      problem(
        DiagnosticCodes.unsupportedItemKind,
        ReasonCodes.itemGeneric,
        `conversions cannot be derived for generic type \`${name}\``,
        { start: first.getStart(), end: last.getEnd() },
        `derive them on an alias that fixes the type arguments, e.g. \`export type Concrete${name} = ${name}<...>\``,
      ),
    )
  }

  return succeed({ name, shape, range: rangeOf(nameNode) })
}

/**
 * Accepts classes, interfaces and type aliases as structs and enums as enums;
 * nothing about their members is read.
 */
export const buildTypeDescriptor = (node: Node): Checked<TypeDescriptor> => {
  if (Node.isEnumDeclaration(node)) return describeDeclaration(node, 'Enum')
  if (Node.isClassDeclaration(node) || Node.isInterfaceDeclaration(node) || Node.isTypeAliasDeclaration(node)) {
    return describeDeclaration(node, 'Struct')
  }
  return fail(
    problem(
      DiagnosticCodes.unsupportedItemKind,
      ReasonCodes.itemUnsupportedKind,
      `conversions can only be derived for a class, interface, type alias or enum, not ${describeItemKind(node)}`,
      rangeOf(node),
    ),
  )
}
