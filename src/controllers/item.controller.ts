// src/controllers/item.controller.ts
import { Request, Response } from 'express';
import { DocumentCollection } from '../services/documentStore';
import { BroadcastDispatcher, toIdentity } from '../sockets/broadcastDispatcher';
import { stampMessage } from '../sockets/messages';
import { CatalogItem, CatalogItemInput, itemBody, toItem } from '../models/Item';
import { ItemEventType } from '../types/realtime.types';
import { Filter } from '../types/store.types';
import { sendStoreError } from '../utils/httpErrors';
import '../types/request.types';

export interface ItemControllerDependencies {
  items: DocumentCollection;
  dispatcher: BroadcastDispatcher;
}

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

const readInput = (req: Request): CatalogItemInput => {
  const { title, releaseDate, rentalPrice, rating, category } = req.body;
  return { title, releaseDate, rentalPrice, rating, category };
};

export const createItemController = ({ items, dispatcher }: ItemControllerDependencies) => {
  const notifyOwner = (owner: string, type: ItemEventType, payload: CatalogItem | string): void => {
    const report = dispatcher.broadcast(toIdentity(owner), stampMessage({ type, payload }, owner));
    console.log(`[WS] ${type} sent to ${report.delivered} connection(s) of ${owner}`);
  };

  /**
   * @route   GET api/items
   * @desc    List the caller's items, optionally filtered by title
   * @access  Private
   */
  const getItems = async (req: Request, res: Response): Promise<Response> => {
    const owner = req.identity;
    if (!owner) {
      return res.status(401).json({ message: 'Not authorized' });
    }

    const filter: Filter = { owner };
    const { search, skip, limit } = req.query;
    if (typeof search === 'string' && search.trim() !== '') {
      filter.title = new RegExp(escapeRegExp(search.trim()), 'i');
    }

    try {
      const docs = await items.query(filter, {
        skip: typeof skip === 'string' ? Number(skip) : undefined,
        limit: typeof limit === 'string' ? Number(limit) : undefined
      });
      return res.json(docs.map(toItem));
    } catch (err) {
      return sendStoreError(res, err, 'Error fetching items');
    }
  };

  /**
   * @route   GET api/items/:id
   * @access  Private
   */
  const getItem = async (req: Request, res: Response): Promise<Response> => {
    const owner = req.identity;
    if (!owner) {
      return res.status(401).json({ message: 'Not authorized' });
    }

    try {
      const doc = await items.findOne({ id: req.params.id, owner });
      if (!doc) {
        return res.status(404).json({ message: 'Item not found' });
      }
      return res.json(toItem(doc));
    } catch (err) {
      return sendStoreError(res, err, 'Error fetching item');
    }
  };

  /**
   * @route   POST api/items
   * @desc    Add an item; titles are unique per owner
   * @access  Private
   */
  const addItem = async (req: Request, res: Response): Promise<Response> => {
    const owner = req.identity;
    if (!owner) {
      return res.status(401).json({ message: 'Not authorized' });
    }

    const input = readInput(req);
    try {
      const doc = await items.insert(itemBody(input, owner), { owner, title: input.title });
      const item = toItem(doc);
      notifyOwner(owner, 'item-created', item);
      return res.status(201).json(item);
    } catch (err) {
      return sendStoreError(res, err, 'Error adding item');
    }
  };

  /**
   * @route   PUT api/items/:id
   * @access  Private
   */
  const editItem = async (req: Request, res: Response): Promise<Response> => {
    const owner = req.identity;
    if (!owner) {
      return res.status(401).json({ message: 'Not authorized' });
    }

    try {
      const doc = await items.replaceOne({ id: req.params.id, owner }, itemBody(readInput(req), owner));
      const item = toItem(doc);
      notifyOwner(owner, 'item-updated', item);
      return res.json(item);
    } catch (err) {
      return sendStoreError(res, err, 'Error editing item');
    }
  };

  /**
   * @route   DELETE api/items/:id
   * @access  Private
   */
  const deleteItem = async (req: Request, res: Response): Promise<Response> => {
    const owner = req.identity;
    if (!owner) {
      return res.status(401).json({ message: 'Not authorized' });
    }

    const { id } = req.params;
    try {
      await items.deleteOne({ id, owner });
      notifyOwner(owner, 'item-deleted', id);
      return res.json({ message: 'Item deleted', id });
    } catch (err) {
      return sendStoreError(res, err, 'Error deleting item');
    }
  };

  return { getItems, getItem, addItem, editItem, deleteItem };
};
