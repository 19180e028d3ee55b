import { AttributeSpec, KindDefinition } from './types';

const text: AttributeSpec = { type: 'string', default: '' };
const integer: AttributeSpec = { type: 'integer', default: 0 };
const float: AttributeSpec = { type: 'float', default: 0 };

export const BASE_MODEL: KindDefinition = { name: 'BaseModel', schema: {} };

export const USER: KindDefinition = {
    name: 'User',
    schema: { email: text, password: text, first_name: text, last_name: text },
};

export const STATE: KindDefinition = { name: 'State', schema: { name: text } };

export const CITY: KindDefinition = { name: 'City', schema: { state_id: text, name: text } };

export const AMENITY: KindDefinition = { name: 'Amenity', schema: { name: text } };

export const PLACE: KindDefinition = {
    name: 'Place',
    schema: {
        city_id: text,
        user_id: text,
        name: text,
        description: text,
        number_rooms: integer,
        number_bathrooms: integer,
        max_guest: integer,
        price_by_night: integer,
        latitude: float,
        longitude: float,
        amenity_ids: { type: 'list', default: [] },
    },
};

export const REVIEW: KindDefinition = {
    name: 'Review',
    schema: { place_id: text, user_id: text, text: text },
};

/** Every built-in kind, in registration order. */
export const BUILT_IN_KINDS: readonly KindDefinition[] = [BASE_MODEL, USER, STATE, CITY, AMENITY, PLACE, REVIEW];
