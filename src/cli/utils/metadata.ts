/**
 * Dataset metadata and the flattened field registry
 */

import type {
  DatasetMetaDocument,
  FieldDescriptor,
  FieldNode,
  MetaValue,
  PlotAxes,
} from "../../types/index.js";

export type DatasetAttributes = Omit<DatasetMetaDocument, "fields">;

export class DatasetMeta {
  id: string;
  name?: string;
  records: number;
  recordType?: string;
  origin?: string;
  plot: PlotAxes;
  assembly: Record<string, MetaValue>;
  taxon: Record<string, MetaValue>;

  // Insertion order is pre-order over the field tree
  private readonly registry = new Map<string, FieldDescriptor>();
  private readonly ancestors = new Map<string, string[]>();

  constructor(attributes: DatasetAttributes) {
    this.id = attributes.id;
    this.name = attributes.name;
    this.records = attributes.records;
    this.recordType = attributes.record_type;
    this.origin = attributes.origin;
    this.plot = { ...attributes.plot };
    this.assembly = { ...attributes.assembly };
    this.taxon = { ...attributes.taxon };
  }

  static fromDocument(document: DatasetMetaDocument): DatasetMeta {
    const { fields, ...attributes } = document;
    const meta = new DatasetMeta(attributes);

    const walk = (nodes: FieldNode[], ancestors: string[], parent?: string): void => {
      for (const node of nodes) {
        const { children, data, ...rest } = node;
        const descriptor: FieldDescriptor = { ...rest };
        if (parent !== undefined && descriptor.parent === undefined) {
          descriptor.parent = parent;
        }
        if (children !== undefined && children.length > 0) {
          descriptor.children = true;
        }
        meta.addField(ancestors, descriptor);
        if (data !== undefined) {
          walk(data, [...ancestors, node.id], node.id);
        }
        if (children !== undefined) {
          walk(children, [...ancestors, node.id]);
        }
      }
    };
    walk(fields, []);

    return meta;
  }

  hasField(fieldId: string): boolean {
    return this.registry.has(fieldId);
  }

  /**
   * Copy of a field's descriptor, or undefined if the field is not registered
   */
  fieldMeta(fieldId: string): FieldDescriptor | undefined {
    const descriptor = this.registry.get(fieldId);
    return descriptor ? structuredClone(descriptor) : undefined;
  }

  listFields(): string[] {
    return [...this.registry.keys()];
  }

  fieldParentList(fieldId: string): string[] {
    return [...(this.ancestors.get(fieldId) ?? [])];
  }

  /**
   * Metadata-only grouping node with no values of its own
   */
  isGroup(fieldId: string): boolean {
    return this.registry.get(fieldId)?.children === true;
  }

  identifierFieldId(): string | undefined {
    for (const [fieldId, descriptor] of this.registry) {
      if (descriptor.type === "identifier") {
        return fieldId;
      }
    }
    return undefined;
  }

  addField(ancestors: string[], descriptor: FieldDescriptor): void {
    this.registry.set(descriptor.id, structuredClone(descriptor));
    this.ancestors.set(descriptor.id, [...ancestors]);
  }

  /**
   * Copy of the dataset-level attributes with an empty field registry
   */
  cloneAttributes(overrides: Partial<DatasetAttributes> = {}): DatasetMeta {
    return new DatasetMeta({ ...this.attributes(), ...overrides });
  }

  private attributes(): DatasetAttributes {
    const attributes: DatasetAttributes = {
      id: this.id,
      records: this.records,
      plot: { ...this.plot },
      assembly: { ...this.assembly },
      taxon: { ...this.taxon },
    };
    if (this.name !== undefined) attributes.name = this.name;
    if (this.recordType !== undefined) attributes.record_type = this.recordType;
    if (this.origin !== undefined) attributes.origin = this.origin;
    return attributes;
  }

  /**
   * Rebuild the nested meta.json document from the flat registry
   */
  toJSON(): DatasetMetaDocument {
    const nodes = new Map<string, FieldNode>();
    const roots: FieldNode[] = [];

    for (const [fieldId, descriptor] of this.registry) {
      const { children, ...rest } = structuredClone(descriptor);
      const node: FieldNode = { ...rest };
      nodes.set(fieldId, node);

      const ancestors = this.ancestors.get(fieldId) ?? [];
      const containerId = ancestors[ancestors.length - 1];
      const container = containerId !== undefined ? nodes.get(containerId) : undefined;

      if (container === undefined) {
        roots.push(node);
      } else if (descriptor.parent === containerId) {
        (container.data ??= []).push(node);
      } else {
        (container.children ??= []).push(node);
      }
      if (children === true && node.children === undefined) {
        node.children = [];
      }
    }

    return { ...this.attributes(), fields: roots };
  }
}
