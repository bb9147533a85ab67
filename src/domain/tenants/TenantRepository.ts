/*
 * MIT License
 * Copyright (c) 2024
 */

export interface Tenant {
  id: number;
  name: string;
  description: string;
  createdAt: string;
}

export interface TenantInput {
  name: string;
  description?: string;
}

export interface TenantRepository {
  create(input: TenantInput): Tenant;
  findByName(name: string): Tenant | undefined;
  list(): Tenant[];
}

export class InMemoryTenantRepository implements TenantRepository {
  private readonly tenants = new Map<number, Tenant>();
  private nextId = 1;

  create(input: TenantInput): Tenant {
    const name = input.name.trim();
    if (name === '') {
      throw new Error('Tenant name must not be empty');
    }
    if (this.findByName(name)) {
      throw new Error(`Tenant "${name}" already exists`);
    }

    const tenant: Tenant = {
      id: this.nextId++,
      name,
      description: input.description ?? '',
      createdAt: new Date().toISOString(),
    };
    this.tenants.set(tenant.id, tenant);
    return tenant;
  }

  findByName(name: string): Tenant | undefined {
    return Array.from(this.tenants.values()).find((tenant) => tenant.name === name);
  }

  list(): Tenant[] {
    return Array.from(this.tenants.values());
  }
}
