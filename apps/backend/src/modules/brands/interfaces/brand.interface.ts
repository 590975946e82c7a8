export interface Brand {
  id: number;
  name: string;
  description: string | null;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface BrandSearch {
  search?: string;
  isActive?: boolean;
  limit: number;
  offset: number;
}

export interface BrandPatch {
  name?: string;
  description?: string | null;
  isActive?: boolean;
}
