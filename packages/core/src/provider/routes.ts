import { UnsupportedResourceError, type ResourceOperation } from '../errors.js';
import { matchUri, type CollectionMatch, type ItemMatch } from '../resources/uri.js';

/** Handlers for one operation, keyed on the kind of resource. A missing entry is unsupported. */
export interface Routes<R> {
  collection?: (match: CollectionMatch) => R;
  item?: (match: ItemMatch) => R;
}

export function route<R>(uri: string, operation: ResourceOperation, routes: Routes<R>): R {
  const match = matchUri(uri);
  switch (match.kind) {
    case 'collection':
      if (routes.collection) return routes.collection(match);
      break;
    case 'item':
      if (routes.item) return routes.item(match);
      break;
  }
  throw new UnsupportedResourceError(uri, operation);
}
