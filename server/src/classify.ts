import { type SyntaxNode, isDefinitionKind, nameNodeOf } from './ast';
import { DEFINITION_SYMBOL_KIND, type FrugalSymbolKind } from './symbols';

export type IdentifierKind = FrugalSymbolKind | 'operation' | 'type_reference' | 'reference';

export interface Classification {
	isDeclaration: boolean;
	kind: IdentifierKind;
}

const REFERENCE: Classification = { isDeclaration: false, kind: 'reference' };

function declaration(kind: IdentifierKind): Classification {
	return { isDeclaration: true, kind };
}

// Decides declaration vs reference from the identifier's position in the tree alone.
export function classifyIdentifier(node: SyntaxNode): Classification {
	const parent = node.parent;
	if (!parent) return REFERENCE;
	const isNameSlot = nameNodeOf(parent) === node;
	if (isDefinitionKind(parent.kind)) {
		// e.g. the parent service named after `extends`
		return isNameSlot ? declaration(DEFINITION_SYMBOL_KIND[parent.kind]) : REFERENCE;
	}
	switch (parent.kind) {
		case 'function_definition':
			return isNameSlot ? declaration('method') : REFERENCE;
		case 'field':
			return declaration(parent.parent?.kind === 'field_list' ? 'parameter' : 'field');
		case 'enum_field':
			return declaration('enum_value');
		case 'scope_operation':
			return isNameSlot ? declaration('operation') : REFERENCE;
		case 'field_type':
			return { isDeclaration: false, kind: 'type_reference' };
		default:
			return REFERENCE;
	}
}
