// Body style
export enum CarType {
  HATCH = 'hatch',
  SEDAN = 'sedan',
  SUV = 'suv',
  HATCHBACK = 'hatchback',
  COUPE = 'coupe',
  CONVERTIBLE = 'convertible',
  WAGON = 'wagon',
  VAN = 'van',
  PICKUP = 'pickup',
  OTHER = 'other',
}

// Listing status
export enum CarStatus {
  AVAILABLE = 'available',
  UNAVAILABLE = 'unavailable',
  SOLD = 'sold',
  MAINTENANCE = 'maintenance',
  RESERVED = 'reserved',
}

export enum CarCondition {
  NEW = 'new',
  USED = 'used',
  CERTIFIED_PRE_OWNED = 'certified pre-owned',
}

export enum CarColor {
  BLACK = 'black',
  WHITE = 'white',
  SILVER = 'silver',
  GRAY = 'gray',
  RED = 'red',
  BLUE = 'blue',
  BROWN = 'brown',
  GREEN = 'green',
  YELLOW = 'yellow',
  ORANGE = 'orange',
  PURPLE = 'purple',
  OTHER = 'other',
}

export enum TransmissionType {
  AUTOMATIC = 'automatic',
  MANUAL = 'manual',
  SEMI_AUTOMATIC = 'semi-automatic',
  CVT = 'cvt',
}

export enum FuelType {
  GASOLINE = 'gasoline',
  ETHANOL = 'ethanol',
  FLEX = 'flex',
  DIESEL = 'diesel',
  ELECTRIC = 'electric',
  HYBRID = 'hybrid',
  OTHER = 'other',
}
