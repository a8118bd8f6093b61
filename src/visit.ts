/**
 * JSON tree visitor
 */

import { type Spanned, spanned } from "./span";
import {
	type JsonArray,
	type JsonBool,
	type JsonNull,
	type JsonNumber,
	type JsonObject,
	type JsonString,
	type JsonValue,
	JsonValueKind,
} from "./types";

/**
 * Walks a spanned JSON tree depth-first in source order
 *
 * Override the visit methods of interest. The default array and object visits descend into
 * children, and `path` holds the keys and indices leading to the node being visited.
 *
 * @example
 * ```ts
 * class StringCollector extends JsonVisitor {
 *   readonly found: Span[] = [];
 *   override visitString(node: Spanned<JsonString>): void {
 *     this.found.push(node.span);
 *   }
 * }
 * ```
 */
export class JsonVisitor {
	protected readonly path: (string | number)[] = [];

	/**
	 * Dispatches on the node's kind
	 */
	visitValue(node: Spanned<JsonValue>): void {
		const value = node.value;
		switch (value.kind) {
			case JsonValueKind.NULL:
				this.visitNull(spanned(value, node.span));
				break;
			case JsonValueKind.BOOL:
				this.visitBool(spanned(value, node.span));
				break;
			case JsonValueKind.NUMBER:
				this.visitNumber(spanned(value, node.span));
				break;
			case JsonValueKind.STRING:
				this.visitString(spanned(value, node.span));
				break;
			case JsonValueKind.ARRAY:
				this.visitArray(spanned(value, node.span));
				break;
			case JsonValueKind.OBJECT:
				this.visitObject(spanned(value, node.span));
				break;
		}
	}

	visitNull(_node: Spanned<JsonNull>): void {}

	visitBool(_node: Spanned<JsonBool>): void {}

	visitNumber(_node: Spanned<JsonNumber>): void {}

	visitString(_node: Spanned<JsonString>): void {}

	/**
	 * Called for each object key before its value is visited
	 */
	visitKey(_key: Spanned<string>): void {}

	visitArray(node: Spanned<JsonArray>): void {
		node.value.items.forEach((item, index) => {
			this.path.push(index);
			this.visitValue(item);
			this.path.pop();
		});
	}

	visitObject(node: Spanned<JsonObject>): void {
		for (const entry of node.value.entries) {
			this.path.push(entry.key.value);
			this.visitKey(entry.key);
			this.visitValue(entry.value);
			this.path.pop();
		}
	}
}
