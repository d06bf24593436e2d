export type ServiceRecord = {
  serviceId: number;
  name: string;
  description: string | null;
  duration: number;
  price: number;
  imageUrl: string | null;
  salonId: number;
  createdAt: string;
  updatedAt: string;
};

/** Columns the caller controls; ids and timestamps belong to the store. */
export type ServiceFields = {
  name: string;
  description: string | null;
  duration: number;
  price: number;
  imageUrl: string | null;
  salonId: number;
};

export type ServiceChanges = Partial<ServiceFields>;

export type PageRequest = {
  offset: number;
  limit: number;
};

export type CreateServiceInput = Omit<ServiceFields, 'imageUrl'> & {
  imageBase64?: string | null;
};

export type UpdateServiceInput = {
  name?: string | null;
  description?: string | null;
  duration?: number | null;
  price?: number | null;
  salonId?: number | null;
  imageBase64?: string | null;
  removeImage?: boolean | null;
};

export type UploadedImage = {
  publicId: string;
  url: string;
  format: string;
};

export type DeletionOutcome =
  | { status: 'deleted' }
  | { status: 'not_deleted'; detail: string }
  | { status: 'unreachable'; error: string };

export type DeleteSummary = {
  success: boolean;
  message: string;
  publicId: string | null;
};

export type ImageUploadSummary = {
  success: boolean;
  url: string;
  publicId: string;
};

// Wire shapes (snake_case) as returned over HTTP.

export type ServiceResponse = {
  service_id: number;
  name: string;
  description: string | null;
  duration: number;
  price: number;
  image_url: string | null;
  salon_id: number;
  created_at: string;
  updated_at: string;
};

export type ImageUploadResponse = {
  success: boolean;
  url: string;
  public_id: string;
};

export type ImageDeleteResponse = {
  success: boolean;
  message: string;
  public_id: string | null;
};

export type ErrorResponse = {
  error: {
    code: string;
    message: string;
    details?: Array<{ path: Array<string | number>; message: string }>;
  };
};
