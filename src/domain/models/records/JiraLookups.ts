import { NamedRecord, RestRecord } from "./RestRecord";

export class JiraProject extends NamedRecord {
  get key(): string | undefined {
    return this.string("key");
  }
}

export class JiraStatusCategory extends NamedRecord {
  get key(): string | undefined {
    return this.string("key");
  }

  get colorName(): string | undefined {
    return this.string("colorName");
  }
}

export class JiraStatus extends NamedRecord {
  get description(): string | undefined {
    return this.string("description");
  }

  get statusCategory(): JiraStatusCategory | undefined {
    return this.child("statusCategory", (d) => new JiraStatusCategory(d));
  }
}

export class JiraPriority extends NamedRecord {}

export class JiraIssueType extends NamedRecord {
  get description(): string | undefined {
    return this.string("description");
  }

  get subtask(): boolean | undefined {
    return this.boolean("subtask");
  }

  get avatarId(): number | undefined {
    return this.number("avatarId");
  }

  get hierarchyLevel(): number | undefined {
    return this.number("hierarchyLevel");
  }
}

export interface ResolutionStruct {
  name: string | null;
  description: string | null;
}

export class JiraResolution extends RestRecord {
  get id(): string | undefined {
    return this.string("id");
  }

  get name(): string | undefined {
    return this.string("name");
  }

  get description(): string | undefined {
    return this.string("description");
  }

  toStruct(): ResolutionStruct {
    return { name: this.name ?? null, description: this.description ?? null };
  }
}
