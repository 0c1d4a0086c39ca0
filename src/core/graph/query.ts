/**
 * Read-only query facade over the application graph.
 * Classification criteria only ever see the graph through this interface.
 */
import type { ApplicationGraph } from './graph.js';
import type { NodeId } from './ids.js';
import { isAbstract } from './nodes.js';
import type {
  ConstructorNode,
  FieldNode,
  MethodNode,
  PackageOrganizationStyle,
  TypeForm,
  TypeNode,
} from './types.js';

export interface GraphQuery {
  /** Look a type up by qualified name or id. */
  type(nameOrId: string | NodeId): TypeNode | undefined;
  types(predicate?: (type: TypeNode) => boolean): TypeNode[];
  typesInPackage(packageName: string): TypeNode[];
  typesWithForm(form: TypeForm): TypeNode[];
  typesAnnotatedWith(annotationName: string): TypeNode[];
  interfaces(): TypeNode[];
  classes(): TypeNode[];
  records(): TypeNode[];
  enums(): TypeNode[];
  abstractTypes(): TypeNode[];

  fieldsOf(type: TypeNode): FieldNode[];
  methodsOf(type: TypeNode): MethodNode[];
  constructorsOf(type: TypeNode): ConstructorNode[];

  supertypeOf(type: TypeNode): TypeNode | undefined;
  interfacesOf(type: TypeNode): TypeNode[];
  subtypesOf(type: TypeNode): TypeNode[];
  implementorsOf(type: TypeNode): TypeNode[];
  /** Interfaces whose method signatures use the type. */
  usersInSignatureOf(type: TypeNode): TypeNode[];
  /** Fields whose type, or a type argument of it, is the type. */
  fieldsReferencing(type: TypeNode): FieldNode[];
  /** Distinct declaring types of {@link fieldsReferencing}, excluding the type itself. */
  containersOf(type: TypeNode): TypeNode[];
  /** Declaring type of a field, method or constructor. */
  declaringTypeOf(member: FieldNode | MethodNode | ConstructorNode): TypeNode | undefined;

  packageOrganizationStyle(): PackageOrganizationStyle;
  /** Types reachable over REFERENCES edges, excluding the start type. */
  transitiveDependencies(type: TypeNode): TypeNode[];
  /** True when the type can reach itself over REFERENCES edges. */
  hasCyclicDependency(type: TypeNode): boolean;
}

export class DefaultGraphQuery implements GraphQuery {
  constructor(private readonly graph: ApplicationGraph) {}

  type(nameOrId: string | NodeId): TypeNode | undefined {
    return this.graph.typeNode(nameOrId);
  }

  types(predicate?: (type: TypeNode) => boolean): TypeNode[] {
    const all = this.graph.typeNodes();
    return predicate ? all.filter(predicate) : all;
  }

  typesInPackage(packageName: string): TypeNode[] {
    return [...this.graph.indexes().typesByPackage(packageName)];
  }

  typesWithForm(form: TypeForm): TypeNode[] {
    return [...this.graph.indexes().typesByForm(form)];
  }

  typesAnnotatedWith(annotationName: string): TypeNode[] {
    return [...this.graph.indexes().typesByAnnotation(annotationName)];
  }

  interfaces(): TypeNode[] {
    return this.typesWithForm('INTERFACE');
  }

  classes(): TypeNode[] {
    return this.typesWithForm('CLASS');
  }

  records(): TypeNode[] {
    return this.typesWithForm('RECORD');
  }

  enums(): TypeNode[] {
    return this.typesWithForm('ENUM');
  }

  abstractTypes(): TypeNode[] {
    return this.types((t) => t.form === 'INTERFACE' || isAbstract(t));
  }

  fieldsOf(type: TypeNode): FieldNode[] {
    return this.graph.fieldsOf(type);
  }

  methodsOf(type: TypeNode): MethodNode[] {
    return this.graph.methodsOf(type);
  }

  constructorsOf(type: TypeNode): ConstructorNode[] {
    return this.graph.constructorsOf(type);
  }

  supertypeOf(type: TypeNode): TypeNode | undefined {
    return this.graph.supertypeOf(type);
  }

  interfacesOf(type: TypeNode): TypeNode[] {
    return this.graph.interfacesOf(type);
  }

  subtypesOf(type: TypeNode): TypeNode[] {
    return this.graph.resolveTypes(this.graph.indexes().subtypesOf(type.id));
  }

  implementorsOf(type: TypeNode): TypeNode[] {
    return this.graph.resolveTypes(this.graph.indexes().implementorsOf(type.id));
  }

  usersInSignatureOf(type: TypeNode): TypeNode[] {
    return this.graph.resolveTypes(this.graph.indexes().interfacesUsingInSignature(type.id));
  }

  fieldsReferencing(type: TypeNode): FieldNode[] {
    const fields: FieldNode[] = [];
    for (const id of this.graph.indexes().fieldsOfType(type.id)) {
      const field = this.graph.fieldNode(id);
      if (field) {
        fields.push(field);
      }
    }
    return fields;
  }

  containersOf(type: TypeNode): TypeNode[] {
    const seen = new Set<string>();
    const containers: TypeNode[] = [];
    for (const field of this.fieldsReferencing(type)) {
      const owner = this.graph.typeNode(field.declaringType);
      if (owner && !owner.id.equals(type.id) && !seen.has(owner.id.value)) {
        seen.add(owner.id.value);
        containers.push(owner);
      }
    }
    return containers;
  }

  declaringTypeOf(member: FieldNode | MethodNode | ConstructorNode): TypeNode | undefined {
    return this.graph.typeNode(member.declaringType);
  }

  packageOrganizationStyle(): PackageOrganizationStyle {
    return this.graph.metadata.style;
  }

  transitiveDependencies(type: TypeNode): TypeNode[] {
    const reached = this.reachableFrom(type.id);
    reached.delete(type.id.value);
    return this.types((t) => reached.has(t.id.value));
  }

  hasCyclicDependency(type: TypeNode): boolean {
    for (const edge of this.graph.edgesFrom(type.id)) {
      if (edge.kind === 'REFERENCES' && this.reachableFrom(edge.to).has(type.id.value)) {
        return true;
      }
    }
    return false;
  }

  /**
   * Ids reachable over REFERENCES edges, including the start.
   */
  private reachableFrom(start: NodeId): Set<string> {
    const visited = new Set<string>([start.value]);
    const stack: NodeId[] = [start];
    let current = stack.pop();
    while (current) {
      for (const edge of this.graph.edgesFrom(current)) {
        if (edge.kind === 'REFERENCES' && !visited.has(edge.to.value)) {
          visited.add(edge.to.value);
          stack.push(edge.to);
        }
      }
      current = stack.pop();
    }
    return visited;
  }
}
