// src/controllers/photo.controller.ts
import { Request, Response } from 'express';
import { DocumentCollection } from '../services/documentStore';
import { photoBody, toPhoto } from '../models/Photo';
import { sendStoreError } from '../utils/httpErrors';
import '../types/request.types';

export const createPhotoController = (photos: DocumentCollection) => {
  /**
   * @route   GET api/photos/:userId
   * @access  Private
   */
  const getPhotosOfUser = async (req: Request, res: Response): Promise<Response> => {
    try {
      const docs = await photos.query({ owner: req.params.userId });
      return res.json(docs.map(toPhoto));
    } catch (err) {
      return sendStoreError(res, err, 'Error fetching photos');
    }
  };

  /**
   * @route   POST api/photos
   * @access  Private
   */
  const addPhoto = async (req: Request, res: Response): Promise<Response> => {
    const owner = req.identity;
    if (!owner) {
      return res.status(401).json({ message: 'Not authorized' });
    }

    const { filepath, caption } = req.body;
    try {
      const doc = await photos.insert(photoBody(owner, filepath, caption));
      return res.status(201).json(toPhoto(doc));
    } catch (err) {
      return sendStoreError(res, err, 'Error adding photo');
    }
  };

  /**
   * @route   DELETE api/photos/:filepath
   * @desc    Only the uploader can delete a photo
   * @access  Private
   */
  const deletePhoto = async (req: Request, res: Response): Promise<Response> => {
    const owner = req.identity;
    if (!owner) {
      return res.status(401).json({ message: 'Not authorized' });
    }

    try {
      await photos.deleteOne({ filepath: req.params.filepath, owner });
      return res.json({ message: 'Photo deleted' });
    } catch (err) {
      return sendStoreError(res, err, 'Error deleting photo');
    }
  };

  return { getPhotosOfUser, addPhoto, deletePhoto };
};
