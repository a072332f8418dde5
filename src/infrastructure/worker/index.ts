export { startFilterListSubscriber, reloadFilterLists } from './filter-list-subscriber.js';
